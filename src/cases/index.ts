/**
 * Test-case source module.
 * Reads JSON/YAML documents and normalizes them into one ordered list.
 */

export { loadTestCases, normalizeDocument } from './loader.js';
export type { LoadedTestCases } from './loader.js';
export { DEFAULT_TEST_CASES } from './defaults.js';
