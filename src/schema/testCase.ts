import { z } from 'zod';

// ── TestCase ─────────────────────────────────────────────────

export const UNNAMED_TEST_CASE = '未命名测试';

// A record without a name or steps still loads; an empty step list
// simply passes.
export const testCaseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).default(UNNAMED_TEST_CASE),
  description: z.string().default(''),
  steps: z.array(z.string().min(1)).default([]),
});

export type TestCase = z.infer<typeof testCaseSchema>;

// ── Source documents ─────────────────────────────────────────
// A document is a list of cases, an object wrapping a `test_cases`
// list, or a single case. Records are validated one by one later,
// so the containers only check the outer shape.

export const testCaseListDocumentSchema = z.array(z.unknown());

export const testCaseWrapperDocumentSchema = z.object({
  test_cases: z.array(z.unknown()),
});

export function parseTestCase(data: unknown): TestCase {
  return testCaseSchema.parse(data);
}
