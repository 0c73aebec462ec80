import type { ChatClient, ChatMessage } from '../llm/index.js';
import type { TestCase } from '../schema/index.js';
import { ADVISORY, LIMITS } from '../config/defaults.js';
import { AdvisoryError, errorMessage } from '../utils/errors.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface AdvisoryOptions {
  model?: string | undefined;
  temperature?: number | undefined;
}

export type AdvisoryOutcome =
  | { ok: true; plan: string }
  | { ok: false; error: AdvisoryError };

// ── Prompt ───────────────────────────────────────────────────

const SYSTEM_PROMPT =
  'You are a professional UI test automation assistant that drives a browser with Playwright.';

const AVAILABLE_ACTIONS = [
  'goto(url): navigate to the URL',
  'click(selector): click an element (CSS selector or text)',
  'fill(selector, text): replace the value of an input',
  'type(selector, text): type text key by key',
  'wait_for_selector(selector, timeout=30000): wait for an element to appear',
  'wait(timeout): wait for a number of milliseconds',
  'screenshot(path): capture the page',
  'get_title(): read the page title',
  'get_text(selector): read the text of an element',
];

export function buildAdvisoryMessages(testCase: TestCase): ChatMessage[] {
  const steps = testCase.steps
    .map((s, i) => `${String(i + 1)}. ${s}`)
    .join('\n');

  const prompt = [
    'You are a UI automation testing expert using Playwright for browser automation.',
    '',
    `Test case description: ${testCase.description}`,
    '',
    'Test steps:',
    steps,
    '',
    'Proceed as follows:',
    '1. Analyse the test case and decide the sequence of Playwright operations',
    '2. Execute each operation and verify the result',
    '3. If a step fails, capture the error and a screenshot',
    '',
    'Available operations:',
    ...AVAILABLE_ACTIONS.map((a) => `- ${a}`),
    '',
    'Describe what to do at each step.',
  ].join('\n');

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: prompt },
  ];
}

// ── Request ──────────────────────────────────────────────────

/**
 * Ask the chat collaborator for a plan. The reply is only logged;
 * execution never reads it. Exceptions become an AdvisoryError value.
 */
export async function requestAdvisoryPlan(
  client: ChatClient,
  testCase: TestCase,
  options: AdvisoryOptions = {},
): Promise<AdvisoryOutcome> {
  const messages = buildAdvisoryMessages(testCase);
  const userMessage = messages[1];
  if (userMessage) log.conversation('user', userMessage.content);

  try {
    const plan = await client.chatCompletion(messages, {
      model: options.model,
      temperature: options.temperature ?? ADVISORY.TEMPERATURE,
    });
    log.conversation('assistant', truncate(plan, LIMITS.MAX_ADVISORY_LOG_CHARS));
    return { ok: true, plan };
  } catch (err) {
    const error = new AdvisoryError(errorMessage(err), { cause: err });
    log.conversation('system', error.message);
    return { ok: false, error };
  }
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
