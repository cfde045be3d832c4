import { z } from 'zod';

import { capturedStateSchema } from './capture.js';
import { actionResultSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Action tally ────────────────────────────────────────────

export const jsonOutputTallySchema = z.object({
  total: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
});

export type JsonOutputTally = z.infer<typeof jsonOutputTallySchema>;

// ── Root output ─────────────────────────────────────────────
// Written as `run.json` in the task directory and printed by `--json`.

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  task: z.string().min(1),
  taskSlug: z.string().min(1),
  taskDir: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  aborted: z.boolean(),
  abortReason: z.string().optional(),
  actions: jsonOutputTallySchema,
  results: z.array(actionResultSchema),
  states: z.array(capturedStateSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
