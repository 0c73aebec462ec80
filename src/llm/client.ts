import { z } from 'zod';

import { aiProviderSchema } from '../schema/config.js';
import type { AIFileConfig, AIProvider } from '../schema/config.js';
import { ConfigurationError } from '../utils/errors.js';

// ── ChatClient interface ─────────────────────────────────────

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  model?: string | undefined;
  temperature?: number | undefined;
}

export interface ChatClient {
  chatCompletion(
    messages: readonly ChatMessage[],
    options?: ChatOptions,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const aiConfigSchema = z.object({
  provider: aiProviderSchema,
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).optional(),
});

export type AIConfig = z.infer<typeof aiConfigSchema>;

// ── Provider environment table ───────────────────────────────

interface ProviderEnv {
  keyVars: readonly string[];
  baseUrlVar?: string;
  modelVar: string;
}

export const PROVIDER_ENV: Record<Exclude<AIProvider, 'mock'>, ProviderEnv> = {
  deepseek: {
    keyVars: ['DEEPSEEK_API_KEY'],
    baseUrlVar: 'DEEPSEEK_BASE_URL',
    modelVar: 'DEEPSEEK_MODEL',
  },
  qwen: {
    keyVars: ['QWEN_API_KEY', 'DASHSCOPE_API_KEY'],
    modelVar: 'QWEN_MODEL',
  },
  copilot: {
    keyVars: ['COPILOT_API_KEY'],
    baseUrlVar: 'COPILOT_BASE_URL',
    modelVar: 'COPILOT_MODEL',
  },
  openai: {
    keyVars: ['OPENAI_API_KEY'],
    baseUrlVar: 'OPENAI_BASE_URL',
    modelVar: 'OPENAI_MODEL',
  },
  anthropic: {
    keyVars: ['ANTHROPIC_API_KEY'],
    modelVar: 'ANTHROPIC_MODEL',
  },
};

// ── Env loader ───────────────────────────────────────────────

/**
 * Build the AI config once at process start. File overrides win
 * over the environment; components receive the resulting struct
 * and never read the environment themselves.
 */
export function loadAIConfig(
  env: NodeJS.ProcessEnv,
  overrides: AIFileConfig = {},
): AIConfig {
  const rawProvider = (overrides.provider ?? env['AI_PROVIDER'] ?? 'deepseek')
    .trim()
    .toLowerCase();

  const provider = aiProviderSchema.safeParse(rawProvider);
  if (!provider.success) {
    throw new ConfigurationError(
      `Unsupported AI provider "${rawProvider}" (expected one of ${aiProviderSchema.options.join(', ')})`,
    );
  }

  if (provider.data === 'mock') {
    return { provider: 'mock' };
  }

  const vars = PROVIDER_ENV[provider.data];
  const apiKey = vars.keyVars
    .map((name) => env[name])
    .find((value) => value !== undefined && value.length > 0);
  const baseUrl =
    overrides.baseUrl ??
    (vars.baseUrlVar !== undefined ? env[vars.baseUrlVar] : undefined);
  const model = overrides.model ?? env[vars.modelVar];

  const parsed = aiConfigSchema.safeParse({
    provider: provider.data,
    ...(apiKey !== undefined ? { apiKey } : {}),
    ...(baseUrl ? { baseUrl } : {}),
    ...(model ? { model } : {}),
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid ${provider.data} configuration: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
    );
  }

  return parsed.data;
}
