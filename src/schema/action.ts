import { z } from 'zod';

// ── Action kind discriminator ────────────────────────────────

export const actionKindSchema = z.enum([
  'navigate',
  'click',
  'fill',
  'type_text',
  'wait_fixed',
  'wait_for_selector',
  'screenshot',
  'get_text',
  'get_title',
]);

export type ActionKind = z.infer<typeof actionKindSchema>;

// ── Individual request schemas ───────────────────────────────

const timeoutField = z.number().int().nonnegative();

export const navigateRequestSchema = z.object({
  kind: z.literal('navigate'),
  url: z.string().url(),
});

export const clickRequestSchema = z.object({
  kind: z.literal('click'),
  selector: z.string().min(1),
  timeout: timeoutField.optional(),
});

export const fillRequestSchema = z.object({
  kind: z.literal('fill'),
  selector: z.string().min(1),
  text: z.string(),
  timeout: timeoutField.optional(),
});

export const typeTextRequestSchema = z.object({
  kind: z.literal('type_text'),
  selector: z.string().min(1),
  text: z.string(),
  timeout: timeoutField.optional(),
});

export const waitFixedRequestSchema = z.object({
  kind: z.literal('wait_fixed'),
  timeout: timeoutField,
});

export const waitForSelectorRequestSchema = z.object({
  kind: z.literal('wait_for_selector'),
  selector: z.string().min(1),
  timeout: timeoutField.optional(),
});

export const screenshotRequestSchema = z.object({
  kind: z.literal('screenshot'),
  path: z.string().min(1),
  fullPage: z.boolean(),
});

export const getTextRequestSchema = z.object({
  kind: z.literal('get_text'),
  selector: z.string().min(1).optional(),
});

export const getTitleRequestSchema = z.object({
  kind: z.literal('get_title'),
});

// ── Union schema ─────────────────────────────────────────────

export const actionRequestSchema = z.discriminatedUnion('kind', [
  navigateRequestSchema,
  clickRequestSchema,
  fillRequestSchema,
  typeTextRequestSchema,
  waitFixedRequestSchema,
  waitForSelectorRequestSchema,
  screenshotRequestSchema,
  getTextRequestSchema,
  getTitleRequestSchema,
]);

export type ActionRequest = z.infer<typeof actionRequestSchema>;

export type NavigateRequest = z.infer<typeof navigateRequestSchema>;
export type ClickRequest = z.infer<typeof clickRequestSchema>;
export type FillRequest = z.infer<typeof fillRequestSchema>;
export type TypeTextRequest = z.infer<typeof typeTextRequestSchema>;
export type WaitFixedRequest = z.infer<typeof waitFixedRequestSchema>;
export type WaitForSelectorRequest = z.infer<typeof waitForSelectorRequestSchema>;
export type ScreenshotRequest = z.infer<typeof screenshotRequestSchema>;
export type GetTextRequest = z.infer<typeof getTextRequestSchema>;
export type GetTitleRequest = z.infer<typeof getTitleRequestSchema>;

// ── ActionResult ─────────────────────────────────────────────

export const actionResultSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  error: z.string().optional(),
  payload: z.string().optional(),
});

export type ActionResult = z.infer<typeof actionResultSchema>;

// ── Parser ───────────────────────────────────────────────────

export function parseActionRequest(data: unknown): ActionRequest {
  return actionRequestSchema.parse(data);
}

/** Human-readable one-liner describing a request for logs and reports. */
export function describeAction(request: ActionRequest): string {
  switch (request.kind) {
    case 'navigate':
      return `navigate ${request.url}`;
    case 'click':
      return `click ${request.selector}`;
    case 'fill':
      return `fill ${request.selector} with "${request.text}"`;
    case 'type_text':
      return `type "${request.text}" into ${request.selector}`;
    case 'wait_fixed':
      return `wait ${String(request.timeout)}ms`;
    case 'wait_for_selector':
      return `wait for ${request.selector}`;
    case 'screenshot':
      return `screenshot ${request.path}`;
    case 'get_text':
      return `read text of ${request.selector ?? 'body'}`;
    case 'get_title':
      return 'read page title';
  }
}
