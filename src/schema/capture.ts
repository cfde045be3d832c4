import { z } from 'zod';

// ── CapturedState ────────────────────────────────────────────
// On-disk metadata record, written beside its screenshot. Field
// names are the persisted wire format.

export const capturedStateSchema = z.object({
  index: z.number().int().positive(),
  url: z.string(),
  timestamp: z.string().datetime(),
  dom_hash: z.string().regex(/^[0-9a-f]{64}$/),
  step: z.string().min(1),
  screenshot: z.string().min(1),
});

export type CapturedState = z.infer<typeof capturedStateSchema>;

// ── Capture summary ──────────────────────────────────────────

export const captureSummarySchema = z.object({
  taskSlug: z.string().min(1),
  totalStates: z.number().int().nonnegative(),
  taskDir: z.string().min(1),
  states: z.array(capturedStateSchema),
});

export type CaptureSummary = z.infer<typeof captureSummarySchema>;

export function parseCapturedState(data: unknown): CapturedState {
  return capturedStateSchema.parse(data);
}
