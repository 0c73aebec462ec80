/**
 * Core orchestration module.
 * Coordinates interpreter → executor → result aggregation.
 * The interpreter is pure; IO happens only through the browser layer.
 */

export { interpret, interpretStep, createInterpreter } from './interpreter.js';
export type { Interpretation, RuleName } from './interpreter.js';
export { buildAdvisoryMessages, requestAdvisoryPlan } from './advisory.js';
export type { AdvisoryOptions, AdvisoryOutcome } from './advisory.js';
export { runTestCase } from './caseRunner.js';
export type { CaseRunnerContext, CaseState } from './caseRunner.js';
export { runSuite } from './suiteRunner.js';
export type { SuiteOptions } from './suiteRunner.js';
