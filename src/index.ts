/**
 * stepqa library entry point.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './llm/index.js';
export * from './cases/index.js';
export * from './report/index.js';
export * from './config/index.js';
export {
  ConfigurationError,
  SessionLaunchError,
  AdvisoryError,
  ActionError,
  ReportingError,
} from './utils/errors.js';
