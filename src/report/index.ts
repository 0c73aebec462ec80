/**
 * Report generation module.
 * Deterministic, no LLM calls.
 * Transforms suite results into markdown + JSON artifacts.
 */

export {
  createFileReporter,
  generateMarkdown,
  generateJSON,
  serializeJSON,
  exitCodeFor,
  loadHistory,
  appendHistory,
} from './reporter.js';
export type { Reporter, FileReporterConfig } from './reporter.js';
