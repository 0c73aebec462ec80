import { chromium } from 'playwright';

import type { Viewport } from '../schema/config.js';
import { SessionLaunchError, errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

/**
 * The slice of a Playwright page the action executor drives.
 * Playwright's `Page` satisfies it structurally; tests pass an
 * in-process fake.
 */
export interface BrowserPage {
  goto(
    url: string,
    options?: {
      timeout?: number;
      waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit';
    },
  ): Promise<unknown>;
  click(selector: string, options?: { timeout?: number }): Promise<void>;
  fill(selector: string, value: string, options?: { timeout?: number }): Promise<void>;
  type(selector: string, text: string, options?: { timeout?: number }): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  waitForSelector(selector: string, options?: { timeout?: number }): Promise<unknown>;
  screenshot(options?: { path?: string; fullPage?: boolean }): Promise<unknown>;
  innerText(selector: string, options?: { timeout?: number }): Promise<string>;
  title(): Promise<string>;
  url(): string;
}

export interface BrowserSession {
  readonly page: BrowserPage;
  close(): Promise<void>;
}

export interface SessionConfig {
  headless: boolean;
  viewport: Viewport;
}

export type SessionLauncher = (config: SessionConfig) => Promise<BrowserSession>;

// ── Session launcher ─────────────────────────────────────────

/**
 * Start one browser process with one context and one page.
 * Any failure here is suite-fatal and surfaces as SessionLaunchError.
 */
export const launchSession: SessionLauncher = async (config) => {
  const browser = await chromium
    .launch({ headless: config.headless })
    .catch((err: unknown) => {
      throw new SessionLaunchError(
        `Failed to launch browser: ${errorMessage(err)}`,
        { cause: err },
      );
    });

  try {
    const context = await browser.newContext({
      viewport: config.viewport,
      ignoreHTTPSErrors: true,
    });
    const page = await context.newPage();
    log.browser('Browser started');

    return {
      page,
      async close(): Promise<void> {
        await browser.close();
        log.browser('Browser closed');
      },
    };
  } catch (err) {
    await browser.close();
    throw new SessionLaunchError(
      `Failed to open browser page: ${errorMessage(err)}`,
      { cause: err },
    );
  }
};
