/**
 * Browser execution module.
 * Deterministic Playwright layer with no LLM calls.
 * Owns the session lifecycle and dispatches single actions.
 */

export { launchSession } from './session.js';
export type {
  BrowserPage,
  BrowserSession,
  SessionConfig,
  SessionLauncher,
} from './session.js';
export { executeAction } from './executor.js';
