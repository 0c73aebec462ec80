import type { ChatClient, ChatMessage, ChatOptions } from './client.js';

const DEFAULT_RESPONSE = 'Mock plan: execute each step in order.';

/**
 * Mock chat provider for offline runs and tests.
 * Cycles through provided canned responses, falling back to a default,
 * and records every request it receives.
 */
export interface MockChatClient extends ChatClient {
  readonly calls: ReadonlyArray<{
    messages: readonly ChatMessage[];
    options: ChatOptions;
  }>;
}

export function createMockClient(
  responses?: readonly string[],
): MockChatClient {
  const calls: Array<{ messages: readonly ChatMessage[]; options: ChatOptions }> = [];

  return {
    calls,
    async chatCompletion(
      messages: readonly ChatMessage[],
      options: ChatOptions = {},
    ): Promise<string> {
      const response = responses?.[calls.length] ?? DEFAULT_RESPONSE;
      calls.push({ messages, options });
      return response;
    },
  };
}
