import Anthropic from '@anthropic-ai/sdk';

import type { ChatClient, ChatMessage, ChatOptions } from './client.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const DEFAULT_TEMPERATURE = 0.3;
const MAX_TOKENS = 4096;
const MAX_RETRIES = 3;

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Error && err.message.includes('429')) return true;
  return false;
}

async function withRetry<T>(fn: () => Promise<T>): Promise<T> {
  for (let attempt = 0; attempt < MAX_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt === MAX_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * 5000;
      log.warn(
        `[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`,
      );
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }

  throw new Error('Anthropic API: max retries exceeded due to rate limiting');
}

// ── Message mapping ──────────────────────────────────────────
// Anthropic takes the system prompt separately from the turns.

function splitMessages(messages: readonly ChatMessage[]): {
  system: string;
  turns: Anthropic.MessageParam[];
} {
  const system = messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n');

  const turns: Anthropic.MessageParam[] = [];
  for (const m of messages) {
    if (m.role === 'system') continue;
    turns.push({ role: m.role, content: m.content });
  }

  return { system, turns };
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): ChatClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  return {
    async chatCompletion(
      messages: readonly ChatMessage[],
      options: ChatOptions = {},
    ): Promise<string> {
      const { system, turns } = splitMessages(messages);

      const response = await withRetry(() =>
        client.messages.create({
          model: options.model ?? resolvedModel,
          max_tokens: MAX_TOKENS,
          ...(system.length > 0 ? { system } : {}),
          messages: turns,
          temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        }),
      );

      const firstBlock = response.content[0];
      if (!firstBlock || firstBlock.type !== 'text') {
        throw new Error('Anthropic API returned no text content');
      }

      return firstBlock.text;
    },
  };
}
