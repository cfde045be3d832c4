import { z } from 'zod';

// ── Action type discriminator ────────────────────────────────

export const actionTypeSchema = z.enum([
  'goto',
  'click_by_text',
  'wait_for_modal',
  'fill_inputs',
  'click_submit',
  'capture_state',
]);

export type ActionType = z.infer<typeof actionTypeSchema>;

// ── Individual action schemas ────────────────────────────────

export const gotoActionSchema = z.object({
  type: z.literal('goto'),
  url: z.string().min(1),
});

export const clickByTextActionSchema = z.object({
  type: z.literal('click_by_text'),
  text: z.string().min(1),
});

export const waitForModalActionSchema = z.object({
  type: z.literal('wait_for_modal'),
});

export const fillInputsActionSchema = z.object({
  type: z.literal('fill_inputs'),
  inputs: z.record(z.string().min(1), z.coerce.string()),
});

export const clickSubmitActionSchema = z.object({
  type: z.literal('click_submit'),
  buttons: z.array(z.string().min(1)).min(1).optional(),
});

export const captureStateActionSchema = z.object({
  type: z.literal('capture_state'),
});

// ── Union schema ─────────────────────────────────────────────

export const actionSchema = z.discriminatedUnion('type', [
  gotoActionSchema,
  clickByTextActionSchema,
  waitForModalActionSchema,
  fillInputsActionSchema,
  clickSubmitActionSchema,
  captureStateActionSchema,
]);

export type Action = z.infer<typeof actionSchema>;

export type GotoAction = z.infer<typeof gotoActionSchema>;
export type ClickByTextAction = z.infer<typeof clickByTextActionSchema>;
export type WaitForModalAction = z.infer<typeof waitForModalActionSchema>;
export type FillInputsAction = z.infer<typeof fillInputsActionSchema>;
export type ClickSubmitAction = z.infer<typeof clickSubmitActionSchema>;
export type CaptureStateAction = z.infer<typeof captureStateActionSchema>;

// ── Raw (unvalidated) action list ────────────────────────────
// Plans are validated loosely so an unknown `type` reaches the
// engine and fails there as a single result, not as a bad plan.

export const rawActionSchema = z
  .object({ type: z.unknown() })
  .passthrough();

export type RawAction = z.infer<typeof rawActionSchema>;

export const rawActionListSchema = z.array(rawActionSchema).min(1);

// ── Parser ───────────────────────────────────────────────────

export type ParsedAction =
  | { ok: true; action: Action }
  | { ok: false; type: string; error: string };

/** Normalised `type` of a raw entry; empty when it has none. */
export function rawActionType(raw: RawAction): string {
  const { type } = raw;
  if (typeof type === 'string') return type.trim().toLowerCase();
  if (typeof type === 'number' || typeof type === 'boolean') return String(type);
  return '';
}

export function parseAction(raw: RawAction): ParsedAction {
  const type = rawActionType(raw);

  if (!type) {
    return { ok: false, type: 'unknown', error: 'Unknown action type: (missing)' };
  }
  if (!actionTypeSchema.safeParse(type).success) {
    return { ok: false, type, error: `Unknown action type: ${type}` };
  }

  const result = actionSchema.safeParse({ ...raw, type });
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    return {
      ok: false,
      type,
      error: `Invalid ${type} action${where}: ${issue?.message ?? 'malformed'}`,
    };
  }

  return { ok: true, action: result.data };
}

/**
 * Step label used in capture file names: `click_submit` → `click-submit`.
 * Anything outside `[a-z0-9-]` also becomes `-`, so an unknown type
 * cannot reach outside the task directory.
 */
export function stepLabel(type: string): string {
  return type.toLowerCase().replace(/[^a-z0-9-]/g, '-');
}
