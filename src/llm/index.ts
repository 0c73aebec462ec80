/**
 * AI advisory module.
 * Provider-agnostic chat-completion interface.
 * Only module allowed to make LLM API calls.
 */

import type { AIConfig, ChatClient } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAICompatibleClient } from './openai.js';
import { createMockClient } from './mock.js';
import { ConfigurationError } from '../utils/errors.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAICompatibleClient } from './openai.js';
export type { OpenAICompatibleOptions } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockChatClient } from './mock.js';

// ── Provider defaults ────────────────────────────────────────

const COMPATIBLE_DEFAULTS = {
  deepseek: { baseUrl: 'https://api.deepseek.com/v1', model: 'deepseek-chat' },
  qwen: {
    baseUrl: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
    model: 'qwen-turbo',
  },
  copilot: { baseUrl: 'https://api.githubcopilot.com/v1', model: 'gpt-4' },
  openai: { baseUrl: 'https://api.openai.com/v1', model: 'gpt-4' },
} as const;

// ── Provider factory ─────────────────────────────────────────

export function createChatClient(config: AIConfig): ChatClient {
  switch (config.provider) {
    case 'deepseek':
    case 'qwen':
    case 'copilot':
    case 'openai': {
      if (!config.apiKey) {
        throw new ConfigurationError(
          `An API key is required when using the ${config.provider} provider`,
        );
      }
      const defaults = COMPATIBLE_DEFAULTS[config.provider];
      return createOpenAICompatibleClient({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl ?? defaults.baseUrl,
        model: config.model ?? defaults.model,
      });
    }
    case 'anthropic': {
      if (!config.apiKey) {
        throw new ConfigurationError(
          'ANTHROPIC_API_KEY is required when using the anthropic provider',
        );
      }
      return createAnthropicClient(config.apiKey, config.model);
    }
    case 'mock':
      return createMockClient();
  }
}
