import test from 'node:test';
import assert from 'node:assert/strict';

import { createChatClient, loadAIConfig } from '../index.js';
import { createOpenAICompatibleClient, retryDelayMs } from '../openai.js';
import { ConfigurationError } from '../../utils/errors.js';

test('loadAIConfig defaults to deepseek and reads its variables', () => {
  const config = loadAIConfig({
    DEEPSEEK_API_KEY: 'test-key',
    DEEPSEEK_MODEL: 'deepseek-reasoner',
  });

  assert.deepEqual(config, {
    provider: 'deepseek',
    apiKey: 'test-key',
    model: 'deepseek-reasoner',
  });
});

test('loadAIConfig accepts either qwen key variable', () => {
  const config = loadAIConfig({ AI_PROVIDER: 'QWEN', DASHSCOPE_API_KEY: 'test-key' });
  assert.deepEqual(config, { provider: 'qwen', apiKey: 'test-key' });
});

test('file overrides win over the environment', () => {
  const config = loadAIConfig(
    {
      AI_PROVIDER: 'deepseek',
      OPENAI_API_KEY: 'test-key',
      OPENAI_MODEL: 'env-model',
    },
    { provider: 'openai', model: 'file-model', baseUrl: 'http://localhost:8080/v1' },
  );

  assert.deepEqual(config, {
    provider: 'openai',
    apiKey: 'test-key',
    baseUrl: 'http://localhost:8080/v1',
    model: 'file-model',
  });
});

test('an unknown provider is a configuration error', () => {
  assert.throws(
    () => loadAIConfig({ AI_PROVIDER: 'gemini' }),
    (err: unknown) => err instanceof ConfigurationError && err.exitCode === 4,
  );
});

test('createChatClient requires a key for remote providers', () => {
  assert.throws(
    () => createChatClient(loadAIConfig({ AI_PROVIDER: 'copilot' })),
    ConfigurationError,
  );
  assert.throws(
    () => createChatClient({ provider: 'anthropic' }),
    /ANTHROPIC_API_KEY is required/,
  );
});

test('the mock provider needs no key', async () => {
  const client = createChatClient(loadAIConfig({ AI_PROVIDER: 'mock' }));
  const reply = await client.chatCompletion([{ role: 'user', content: 'hi' }]);
  assert.equal(typeof reply, 'string');
});

test('the compatible client posts a chat completion and returns the content', async (t) => {
  const fetchMock = t.mock.method(globalThis, 'fetch', async () =>
    new Response(
      JSON.stringify({ choices: [{ message: { content: 'the plan' } }] }),
      { status: 200, headers: { 'Content-Type': 'application/json' } },
    ),
  );
  const client = createOpenAICompatibleClient({
    apiKey: 'test-key',
    baseUrl: 'https://llm.invalid/v1/',
    model: 'base-model',
  });

  const reply = await client.chatCompletion(
    [{ role: 'user', content: 'plan this' }],
    { temperature: 0.3 },
  );

  assert.equal(reply, 'the plan');
  assert.equal(fetchMock.mock.callCount(), 1);
  const [url, init] = fetchMock.mock.calls[0]?.arguments ?? [];
  assert.equal(url, 'https://llm.invalid/v1/chat/completions');
  assert.deepEqual(JSON.parse(String(init?.body)), {
    model: 'base-model',
    messages: [{ role: 'user', content: 'plan this' }],
    temperature: 0.3,
  });
});

test('the compatible client rejects on an HTTP error', async (t) => {
  t.mock.method(globalThis, 'fetch', async () =>
    new Response('bad key', { status: 401 }),
  );
  const client = createOpenAICompatibleClient({
    apiKey: 'test-key',
    baseUrl: 'https://llm.invalid/v1',
    model: 'base-model',
  });

  await assert.rejects(
    client.chatCompletion([{ role: 'user', content: 'x' }]),
    /Chat completion API error \(401\): bad key/,
  );
});

test('the compatible client gives up on a request that never answers', async (t) => {
  t.mock.method(
    globalThis,
    'fetch',
    async (_input: string | URL | Request, init?: RequestInit): Promise<Response> =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(init?.signal?.reason);
        });
      }),
  );
  const client = createOpenAICompatibleClient({
    apiKey: 'test-key',
    baseUrl: 'https://llm.invalid/v1',
    model: 'base-model',
    timeoutMs: 20,
  });

  await assert.rejects(
    client.chatCompletion([{ role: 'user', content: 'x' }]),
    /Chat completion API timed out after 20ms/,
  );
});

test('retry-after accepts seconds or an HTTP date', () => {
  const now = Date.parse('2026-01-02T03:04:00Z');

  assert.equal(retryDelayMs('2', 0, now), 2000);
  assert.equal(retryDelayMs('Fri, 02 Jan 2026 03:04:05 GMT', 0, now), 5000);
  assert.equal(retryDelayMs('Fri, 02 Jan 2026 03:03:00 GMT', 0, now), 0);
  assert.equal(retryDelayMs(null, 1, now), 10_000);
  assert.equal(retryDelayMs('soon', 0, now), 5000);
});
