import type { ActionRequest, ActionResult } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { ActionError, errorMessage } from '../utils/errors.js';
import type { BrowserPage, BrowserSession } from './session.js';

// ── Public API ───────────────────────────────────────────────

/**
 * Run one action against the session's page.
 *
 * Never rejects: every browser or filesystem fault is returned as
 * `{ success: false, error }` so callers only branch on the result.
 */
export async function executeAction(
  request: ActionRequest,
  session: BrowserSession | undefined,
): Promise<ActionResult> {
  if (!session) {
    return { success: false, error: 'session not initialized' };
  }

  try {
    return await performAction(session.page, request);
  } catch (err) {
    return { success: false, error: errorMessage(err) };
  }
}

// ── Action dispatch ──────────────────────────────────────────

async function performAction(
  page: BrowserPage,
  request: ActionRequest,
): Promise<ActionResult> {
  switch (request.kind) {
    case 'navigate': {
      assertHttpUrl(request.url);
      await page.goto(request.url, {
        waitUntil: 'networkidle',
        timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
      });
      return { success: true, message: `Navigated to ${request.url}` };
    }

    case 'click':
      await page.click(request.selector, {
        timeout: request.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
      });
      return { success: true, message: `Clicked ${request.selector}` };

    case 'fill':
      await page.fill(request.selector, request.text, {
        timeout: request.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
      });
      return {
        success: true,
        message: `Filled ${request.selector} with "${request.text}"`,
      };

    case 'type_text':
      await page.type(request.selector, request.text, {
        timeout: request.timeout ?? TIMEOUTS.ACTION_TIMEOUT,
      });
      return {
        success: true,
        message: `Typed "${request.text}" into ${request.selector}`,
      };

    case 'wait_fixed':
      await page.waitForTimeout(request.timeout);
      return { success: true, message: `Waited ${String(request.timeout)}ms` };

    case 'wait_for_selector':
      await page.waitForSelector(request.selector, {
        timeout: request.timeout ?? TIMEOUTS.WAIT_FOR_SELECTOR_TIMEOUT,
      });
      return { success: true, message: `Element ${request.selector} appeared` };

    case 'screenshot':
      await page.screenshot({ path: request.path, fullPage: request.fullPage });
      return { success: true, message: `Saved screenshot to ${request.path}` };

    case 'get_text': {
      const selector = request.selector ?? 'body';
      const text = await page.innerText(selector, {
        timeout: TIMEOUTS.ACTION_TIMEOUT,
      });
      return { success: true, message: `Read text of ${selector}`, payload: text };
    }

    case 'get_title': {
      const title = await page.title();
      return { success: true, message: `Page title: ${title}`, payload: title };
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────

function assertHttpUrl(raw: string): void {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ActionError(`Invalid URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ActionError(`Unsupported URL scheme: ${url.protocol}`);
  }
}
