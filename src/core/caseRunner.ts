import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { ChatClient } from '../llm/index.js';
import { describeAction } from '../schema/index.js';
import type {
  ActionResult,
  SelectorProfile,
  StepResult,
  TestCase,
  TestCaseResult,
} from '../schema/index.js';
import type { BrowserSession } from '../browser/session.js';
import { executeAction } from '../browser/executor.js';
import {
  DEFAULT_SELECTORS,
  DEFAULT_TITLE_MARKERS,
  PATHS,
} from '../config/defaults.js';
import { ReportingError, errorMessage } from '../utils/errors.js';
import { formatTimestamp } from '../utils/time.js';
import * as log from '../utils/logger.js';
import { requestAdvisoryPlan } from './advisory.js';
import type { AdvisoryOptions } from './advisory.js';
import { interpretStep } from './interpreter.js';
import type { Interpretation } from './interpreter.js';

// ── Public types ─────────────────────────────────────────────

export type CaseState =
  | 'idle'
  | 'advisory_requested'
  | 'executing'
  | 'passed'
  | 'failed'
  | 'reported';

export interface CaseRunnerContext {
  session: BrowserSession;
  chat: ChatClient;
  /** Root for failure screenshots; result paths are relative to it. */
  reportsDir: string;
  selectors?: SelectorProfile | undefined;
  titleMarkers?: readonly string[] | undefined;
  /**
   * When true (the default), a failed advisory call fails the case
   * before any step runs, even though execution never reads the plan.
   */
  failCaseOnAdvisoryError?: boolean | undefined;
  advisory?: AdvisoryOptions | undefined;
  onTransition?: ((state: CaseState, testCase: TestCase) => void) | undefined;
}

// ── State machine ────────────────────────────────────────────

const TRANSITIONS: Record<CaseState, readonly CaseState[]> = {
  idle: ['advisory_requested'],
  advisory_requested: ['executing', 'failed'],
  executing: ['passed', 'failed'],
  passed: ['reported'],
  failed: ['reported'],
  reported: [],
};

class CaseStateMachine {
  private current: CaseState = 'idle';

  constructor(
    private readonly testCase: TestCase,
    private readonly onTransition: CaseRunnerContext['onTransition'],
  ) {
    this.onTransition?.('idle', testCase);
  }

  to(next: CaseState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(
        `Illegal test case transition ${this.current} -> ${next} (${this.testCase.id})`,
      );
    }
    this.current = next;
    this.onTransition?.(next, this.testCase);
  }
}

// ── Step execution ───────────────────────────────────────────

interface ExecutionOutcome {
  steps: StepResult[];
  error?: string;
}

async function executeSteps(
  testCase: TestCase,
  context: CaseRunnerContext,
): Promise<ExecutionOutcome> {
  const selectors = context.selectors ?? DEFAULT_SELECTORS;
  const markers = context.titleMarkers ?? DEFAULT_TITLE_MARKERS;
  const total = testCase.steps.length;
  const steps: StepResult[] = [];

  for (const [i, description] of testCase.steps.entries()) {
    const index = i + 1;
    log.step(index, total, description);

    const interpretation = interpretStep(description, selectors);
    log.detail(`→ ${describeAction(interpretation.request)}`);
    const result = await executeAction(interpretation.request, context.session);
    const stepResult = toStepResult(index, description, interpretation, result, markers);

    log.stepResult(index, total, stepResult.success, stepResult.message ?? description);
    steps.push(stepResult);

    if (!stepResult.success) {
      const error = stepResult.error ?? `Step ${String(index)} failed`;
      log.detail(error);
      return { steps, error };
    }
  }

  return { steps };
}

function toStepResult(
  index: number,
  description: string,
  interpretation: Interpretation,
  result: ActionResult,
  titleMarkers: readonly string[],
): StepResult {
  const base = { index, description };
  const { request } = interpretation;

  // Fixed waits (the default no-op included) never fail a step.
  if (request.kind === 'wait_fixed') {
    if (!result.success) {
      log.warn(`Wait interrupted: ${result.error ?? 'unknown error'}`);
    }
    const message =
      interpretation.rule === 'default'
        ? 'Step executed'
        : `Waited ${String(request.timeout)}ms`;
    return { ...base, success: true, message };
  }

  if (!result.success) {
    return {
      ...base,
      success: false,
      ...(result.message !== undefined ? { message: result.message } : {}),
      error: result.error ?? 'Action failed',
    };
  }

  if (request.kind === 'get_title') {
    const title = result.payload ?? '';
    const lower = title.toLowerCase();
    const ok = titleMarkers.some((m) => lower.includes(m.toLowerCase()));
    return ok
      ? { ...base, success: true, message: `Title verified: ${title}` }
      : { ...base, success: false, error: `Title verification failed: ${title}` };
  }

  return {
    ...base,
    success: true,
    ...(result.message !== undefined ? { message: result.message } : {}),
  };
}

// ── Failure artifact ─────────────────────────────────────────

async function captureFailureScreenshot(
  testCase: TestCase,
  context: CaseRunnerContext,
): Promise<string | undefined> {
  const dir = path.join(context.reportsDir, PATHS.SCREENSHOTS_SUBDIR);
  const fileName = `${safeFileName(testCase.id)}_${formatTimestamp(new Date())}.png`;
  const filePath = path.join(dir, fileName);

  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    const failure = new ReportingError(
      `Cannot create screenshot directory ${dir}: ${errorMessage(err)}`,
      { cause: err },
    );
    log.warn(failure.message);
    return undefined;
  }

  const result = await executeAction(
    { kind: 'screenshot', path: filePath, fullPage: true },
    context.session,
  );
  if (!result.success) {
    const failure = new ReportingError(
      `Failed to capture screenshot: ${result.error ?? 'unknown error'}`,
    );
    log.warn(failure.message);
    return undefined;
  }

  return path.relative(context.reportsDir, filePath);
}

function safeFileName(value: string): string {
  return value.replace(/[\\/:*?"<>|\s]+/g, '_');
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Run one test case: advisory plan, then each step in order with
 * fail-fast, then a failure screenshot when the case did not pass.
 */
export async function runTestCase(
  testCase: TestCase,
  context: CaseRunnerContext,
): Promise<TestCaseResult> {
  const startedAt = new Date();
  const machine = new CaseStateMachine(testCase, context.onTransition);
  log.section(`${testCase.name} (${testCase.id})`);

  // ── 1. Advisory plan (logged only) ─────────────────────────

  machine.to('advisory_requested');
  const advisory = await requestAdvisoryPlan(context.chat, testCase, context.advisory);

  let steps: StepResult[] = [];
  let caseError: string | undefined;

  if (!advisory.ok && context.failCaseOnAdvisoryError !== false) {
    caseError = advisory.error.message;
  } else {
    if (!advisory.ok) {
      log.warn(`${advisory.error.message} (continuing without a plan)`);
    }

    // ── 2. Deterministic execution ────────────────────────────

    machine.to('executing');
    const outcome = await executeSteps(testCase, context);
    steps = outcome.steps;
    caseError = outcome.error;
  }

  const success =
    caseError === undefined &&
    steps.length === testCase.steps.length &&
    steps.every((s) => s.success);

  machine.to(success ? 'passed' : 'failed');

  // ── 3. Failure artifact ────────────────────────────────────

  const screenshot = success
    ? undefined
    : await captureFailureScreenshot(testCase, context);

  const finishedAt = new Date();
  machine.to('reported');

  const duration = Math.max(0, (finishedAt.getTime() - startedAt.getTime()) / 1000);
  log.caseResult(testCase.name, success, duration);

  return {
    id: testCase.id,
    name: testCase.name,
    description: testCase.description,
    success,
    duration,
    ...(success ? {} : { error: caseError ?? 'Test case failed' }),
    ...(screenshot !== undefined ? { screenshot } : {}),
    steps,
    startTime: startedAt.toISOString(),
    endTime: finishedAt.toISOString(),
  };
}
