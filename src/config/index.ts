/**
 * Configuration module.
 * Loads and validates runtime config from the config file.
 * Zod-validated. Environment lookups happen only in the CLI layer.
 */

export {
  TIMEOUTS,
  PACING,
  ADVISORY,
  PATHS,
  LIMITS,
  DEFAULT_SELECTORS,
  DEFAULT_TITLE_MARKERS,
  resolveSelectorProfile,
} from './defaults.js';
export { loadConfigFile } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
