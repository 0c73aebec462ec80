import type { ChatClient } from '../llm/index.js';
import type { SelectorProfile, TestCase, TestCaseResult } from '../schema/index.js';
import type { BrowserSession, SessionConfig, SessionLauncher } from '../browser/session.js';
import { launchSession } from '../browser/session.js';
import type { Reporter } from '../report/reporter.js';
import { PACING } from '../config/defaults.js';
import { ReportingError, SessionLaunchError, errorMessage } from '../utils/errors.js';
import { delay } from '../utils/time.js';
import * as log from '../utils/logger.js';
import type { AdvisoryOptions } from './advisory.js';
import { runTestCase } from './caseRunner.js';
import type { CaseRunnerContext } from './caseRunner.js';

// ── Public types ─────────────────────────────────────────────

export interface SuiteOptions {
  chat: ChatClient;
  reportsDir: string;
  session: SessionConfig;
  launch?: SessionLauncher | undefined;
  reporter?: Reporter | undefined;
  pacingMs?: number | undefined;
  /** Waits out the pacing gap between cases. */
  pause?: ((ms: number) => Promise<void>) | undefined;
  selectors?: SelectorProfile | undefined;
  titleMarkers?: readonly string[] | undefined;
  failCaseOnAdvisoryError?: boolean | undefined;
  advisory?: AdvisoryOptions | undefined;
  onTransition?: CaseRunnerContext['onTransition'];
}

// ── Session acquisition ──────────────────────────────────────

async function acquireSession(options: SuiteOptions): Promise<BrowserSession> {
  const launch = options.launch ?? launchSession;
  try {
    return await launch(options.session);
  } catch (err) {
    if (err instanceof SessionLaunchError) throw err;
    throw new SessionLaunchError(
      `Failed to start browser session: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

async function releaseSession(session: BrowserSession): Promise<void> {
  try {
    await session.close();
  } catch (err) {
    log.warn(`Browser teardown failed: ${errorMessage(err)}`);
  }
}

// ── Case isolation ───────────────────────────────────────────
// runTestCase converts every expected fault into a result; anything
// that still escapes is recorded against that case only.

async function runCaseIsolated(
  testCase: TestCase,
  context: CaseRunnerContext,
): Promise<TestCaseResult> {
  const startedAt = new Date();
  try {
    return await runTestCase(testCase, context);
  } catch (err) {
    const finishedAt = new Date();
    const message = errorMessage(err);
    log.error(`Test case ${testCase.id} aborted: ${message}`);
    return {
      id: testCase.id,
      name: testCase.name,
      description: testCase.description,
      success: false,
      duration: Math.max(0, (finishedAt.getTime() - startedAt.getTime()) / 1000),
      error: message,
      steps: [],
      startTime: startedAt.toISOString(),
      endTime: finishedAt.toISOString(),
    };
  }
}

// ── Reporting ────────────────────────────────────────────────

async function deliver(
  results: readonly TestCaseResult[],
  reporter: Reporter | undefined,
): Promise<void> {
  if (!reporter) return;
  try {
    const written = await reporter.report(results);
    for (const file of written) {
      log.report(`Report written: ${file}`);
    }
  } catch (err) {
    const failure = new ReportingError(
      `Failed to write report: ${errorMessage(err)}`,
      { cause: err },
    );
    log.error(failure.message);
  }
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Run every case in order against one browser session.
 *
 * The session is acquired before the first case and released on
 * every exit path. A launch failure rejects with SessionLaunchError
 * before any case runs; case failures never stop the suite.
 */
export async function runSuite(
  testCases: readonly TestCase[],
  options: SuiteOptions,
): Promise<TestCaseResult[]> {
  log.info(`Running ${String(testCases.length)} test case(s)`);

  const session = await acquireSession(options);
  const pacingMs = options.pacingMs ?? PACING.BETWEEN_CASES_MS;
  const pause = options.pause ?? delay;
  const context: CaseRunnerContext = {
    session,
    chat: options.chat,
    reportsDir: options.reportsDir,
    selectors: options.selectors,
    titleMarkers: options.titleMarkers,
    failCaseOnAdvisoryError: options.failCaseOnAdvisoryError,
    advisory: options.advisory,
    onTransition: options.onTransition,
  };

  const results: TestCaseResult[] = [];
  try {
    for (const [i, testCase] of testCases.entries()) {
      if (i > 0 && pacingMs > 0) {
        await pause(pacingMs);
      }
      results.push(await runCaseIsolated(testCase, context));
    }
  } finally {
    await releaseSession(session);
  }

  await deliver(results, options.reporter);
  return results;
}
