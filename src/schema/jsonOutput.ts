import { z } from 'zod';

import { stepResultSchema, suiteSummarySchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Case output ─────────────────────────────────────────────

export const jsonOutputCaseSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  result: z.enum(['PASS', 'FAIL']),
  durationMs: z.number().int().nonnegative(),
  error: z.string().nullable(),
  screenshot: z.string().nullable(),
  startTime: z.string(),
  endTime: z.string(),
  steps: z.array(stepResultSchema),
});

export type JsonOutputCase = z.infer<typeof jsonOutputCaseSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  summary: suiteSummarySchema,
  exitCode: z.number().int().nonnegative(),
  cases: z.array(jsonOutputCaseSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
