import { z } from 'zod';

// ── AI provider ─────────────────────────────────────────────

export const aiProviderSchema = z.enum([
  'deepseek',
  'qwen',
  'copilot',
  'openai',
  'anthropic',
  'mock',
]);

export type AIProvider = z.infer<typeof aiProviderSchema>;

export const aiFileConfigSchema = z.object({
  provider: aiProviderSchema.optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export type AIFileConfig = z.infer<typeof aiFileConfigSchema>;

// ── Selector profile ────────────────────────────────────────
// Fixed CSS fallbacks used by the interpreter's search and click
// rules. The step text never contributes to these selectors.

export const selectorProfileSchema = z.object({
  searchBox: z.string().min(1),
  submitButton: z.string().min(1),
  clickable: z.string().min(1),
});

export type SelectorProfile = z.infer<typeof selectorProfileSchema>;

// ── Viewport ────────────────────────────────────────────────

export const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export type Viewport = z.infer<typeof viewportSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  testCaseDir: z.string().min(1).optional().default('testcase'),
  reportsDir: z.string().min(1).optional().default('reports'),
  headless: z.boolean().optional().default(false),
  pacingMs: z.number().int().nonnegative().optional().default(2000),
  viewport: viewportSchema.optional().default({ width: 1920, height: 1080 }),
  ai: aiFileConfigSchema.optional(),
  selectors: selectorProfileSchema.partial().optional(),
  titleMarkers: z.array(z.string().min(1)).min(1).optional(),
  failCaseOnAdvisoryError: z.boolean().optional().default(true),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
