// ── Error taxonomy ──────────────────────────────────────────
// Exit codes follow the CLI contract: 4 means the run could not
// start or was misconfigured.

/** Missing credential, unknown provider or invalid config file. */
export class ConfigurationError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The browser session could not be started; the suite aborts. */
export class SessionLaunchError extends Error {
  readonly exitCode = 4;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SessionLaunchError';
  }
}

/** The AI advisory call failed for one test case. */
export class AdvisoryError extends Error {
  constructor(detail: string, options?: ErrorOptions) {
    super(`AI call failed: ${detail}`, options);
    this.name = 'AdvisoryError';
  }
}

/** A browser action fault. Never escapes the action executor. */
export class ActionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ActionError';
  }
}

/** Screenshot or report writing failed. Logged, never fatal. */
export class ReportingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReportingError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
