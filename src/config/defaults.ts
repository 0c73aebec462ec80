/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

import type { SelectorProfile } from '../schema/config.js';

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_TIMEOUT: 30_000,
  WAIT_FOR_SELECTOR_TIMEOUT: 30_000,
  VERIFY_WAIT: 2_000,
  WAIT_STEP: 3_000,
  DEFAULT_STEP_WAIT: 1_000,
} as const;

export const PACING = {
  BETWEEN_CASES_MS: 2_000,
} as const;

export const ADVISORY = {
  TEMPERATURE: 0.3,
} as const;

export const PATHS = {
  CONFIG_FILE: '.stepqa.yaml',
  TEST_CASE_DIR: 'testcase',
  REPORTS_DIR: 'reports',
  SCREENSHOTS_SUBDIR: 'screenshots',
  HISTORY_FILE: 'history.json',
} as const;

export const LIMITS = {
  MAX_HISTORY_ENTRIES: 50,
  MAX_ADVISORY_LOG_CHARS: 4_000,
} as const;

// Tuned for one reference search site's markup. Other sites need
// a `selectors:` block in the config file.
export const DEFAULT_SELECTORS: SelectorProfile = {
  searchBox: "input[name='wd'], input#kw",
  submitButton: "input[type='submit'], button, #su",
  clickable: 'button, a',
};

export const DEFAULT_TITLE_MARKERS: readonly string[] = ['百度', 'playwright'];

/** Fill a partial `selectors:` block from the config file with the defaults. */
export function resolveSelectorProfile(
  overrides: Partial<Record<keyof SelectorProfile, string | undefined>> = {},
): SelectorProfile {
  return {
    searchBox: overrides.searchBox ?? DEFAULT_SELECTORS.searchBox,
    submitButton: overrides.submitButton ?? DEFAULT_SELECTORS.submitButton,
    clickable: overrides.clickable ?? DEFAULT_SELECTORS.clickable,
  };
}
