import { z } from 'zod';

import { authStateSchema } from './page.js';
import { captureSummarySchema } from './capture.js';

// ── Per-action results ───────────────────────────────────────

const baseFields = {
  success: z.boolean(),
  error: z.string().optional(),
};

export const gotoResultSchema = z.object({
  ...baseFields,
  action: z.literal('goto'),
  url: z.string(),
  /** Why navigation failed, when it did. */
  reason: z.enum(['timeout', 'failed']).optional(),
});

export const clickByTextResultSchema = z.object({
  ...baseFields,
  action: z.literal('click_by_text'),
  text: z.string().optional(),
  method: z.string().optional(),
  authState: authStateSchema.optional(),
});

export const waitForModalResultSchema = z.object({
  ...baseFields,
  action: z.literal('wait_for_modal'),
  selector: z.string().optional(),
});

export const fillInputsResultSchema = z.object({
  ...baseFields,
  action: z.literal('fill_inputs'),
  filled: z.record(z.string()),
  methods: z.record(z.string()),
  errors: z.record(z.string()),
  isSearch: z.boolean(),
});

export const clickSubmitResultSchema = z.object({
  ...baseFields,
  action: z.literal('click_submit'),
  button: z.string().optional(),
  method: z.string().optional(),
});

export const captureStateResultSchema = z.object({
  ...baseFields,
  action: z.literal('capture_state'),
  url: z.string().optional(),
  title: z.string().optional(),
});

/** Result for an entry whose `type` is not a known action, or is malformed. */
export const rejectedActionResultSchema = z.object({
  success: z.literal(false),
  action: z.string(),
  error: z.string(),
});

export const actionResultSchema = z.union([
  gotoResultSchema,
  clickByTextResultSchema,
  waitForModalResultSchema,
  fillInputsResultSchema,
  clickSubmitResultSchema,
  captureStateResultSchema,
  rejectedActionResultSchema,
]);

export type GotoResult = z.infer<typeof gotoResultSchema>;
export type ClickByTextResult = z.infer<typeof clickByTextResultSchema>;
export type WaitForModalResult = z.infer<typeof waitForModalResultSchema>;
export type FillInputsResult = z.infer<typeof fillInputsResultSchema>;
export type ClickSubmitResult = z.infer<typeof clickSubmitResultSchema>;
export type CaptureStateResult = z.infer<typeof captureStateResultSchema>;
export type RejectedActionResult = z.infer<typeof rejectedActionResultSchema>;
export type ActionResult = z.infer<typeof actionResultSchema>;

// ── RunReport ────────────────────────────────────────────────

export const runReportSchema = z.object({
  runId: z.string().min(1),
  task: z.string().min(1),
  taskSlug: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  aborted: z.boolean(),
  abortReason: z.string().optional(),
  results: z.array(actionResultSchema),
  capture: captureSummarySchema,
});

export type RunReport = z.infer<typeof runReportSchema>;

// ── Deterministic exit code ──────────────────────────────────

export function computeExitCode(report: RunReport): number {
  if (report.aborted) return 2;
  return report.results.every((r) => r.success) ? 0 : 1;
}

export function parseRunReport(data: unknown): RunReport {
  return runReportSchema.parse(data);
}
