import { z } from 'zod';

import type { ChatClient, ChatMessage, ChatOptions } from './client.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

export interface OpenAICompatibleOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  /** Per-request limit; a request still pending after it is aborted. */
  timeoutMs?: number | undefined;
}

const DEFAULT_TEMPERATURE = 0.3;
const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_RETRIES = 3;

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .nonempty(),
});

// ── Rate-limit-aware fetch ───────────────────────────────────

/**
 * Wait before retrying a 429. `retry-after` is either delay-seconds
 * or an HTTP date; anything else falls back to linear backoff.
 */
export function retryDelayMs(
  retryAfter: string | null,
  attempt: number,
  now: number = Date.now(),
): number {
  const backoff = (attempt + 1) * 5000;
  if (retryAfter === null || retryAfter.trim() === '') return backoff;

  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

  const at = Date.parse(retryAfter);
  if (Number.isFinite(at)) return Math.max(0, at - now);

  return backoff;
}

async function fetchWithRetry(
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new Error(
          `Chat completion API timed out after ${String(timeoutMs)}ms`,
          { cause: err },
        );
      }
      throw err;
    }

    if (response.status === 429) {
      const waitMs = retryDelayMs(response.headers.get('retry-after'), attempt);
      log.warn(
        `[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`,
      );
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `Chat completion API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error('Chat completion API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

/**
 * Client for any endpoint speaking the OpenAI chat-completions
 * protocol (DeepSeek, Qwen compatible mode, Copilot, OpenAI).
 */
export function createOpenAICompatibleClient(
  options: OpenAICompatibleOptions,
): ChatClient {
  const url = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;

  return {
    async chatCompletion(
      messages: readonly ChatMessage[],
      chatOptions: ChatOptions = {},
    ): Promise<string> {
      const response = await fetchWithRetry(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify({
          model: chatOptions.model ?? options.model,
          messages,
          temperature: chatOptions.temperature ?? DEFAULT_TEMPERATURE,
        }),
      }, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

      const raw = await response.text();
      const body: unknown = JSON.parse(raw);
      const parsed = chatResponseSchema.parse(body);

      return parsed.choices[0].message.content ?? '';
    },
  };
}
