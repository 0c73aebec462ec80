import { z } from 'zod';

// ── StepResult ───────────────────────────────────────────────

export const stepResultSchema = z.object({
  index: z.number().int().positive(),
  description: z.string(),
  success: z.boolean(),
  message: z.string().optional(),
  error: z.string().optional(),
});

export type StepResult = z.infer<typeof stepResultSchema>;

// ── TestCaseResult ───────────────────────────────────────────

export const testCaseResultSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  success: z.boolean(),
  /** Wall-clock seconds from case start to report. */
  duration: z.number().nonnegative(),
  error: z.string().optional(),
  /** Failure screenshot, relative to the reports directory. */
  screenshot: z.string().optional(),
  steps: z.array(stepResultSchema),
  startTime: z.string().datetime(),
  endTime: z.string().datetime(),
});

export type TestCaseResult = z.infer<typeof testCaseResultSchema>;

// ── Suite summary ────────────────────────────────────────────

export const suiteSummarySchema = z.object({
  timestamp: z.string().min(1),
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  passRate: z.number().min(0).max(1),
  duration: z.number().nonnegative(),
});

export type SuiteSummary = z.infer<typeof suiteSummarySchema>;

// ── Deterministic summary ────────────────────────────────────

export function summarizeResults(
  results: readonly TestCaseResult[],
  timestamp: string,
): SuiteSummary {
  const total = results.length;
  const passed = results.filter((r) => r.success).length;
  const duration = results.reduce((sum, r) => sum + r.duration, 0);

  return {
    timestamp,
    total,
    passed,
    failed: total - passed,
    passRate: total === 0 ? 0 : passed / total,
    duration,
  };
}

// ── Validators ───────────────────────────────────────────────

export function parseTestCaseResult(data: unknown): TestCaseResult {
  return testCaseResultSchema.parse(data);
}
