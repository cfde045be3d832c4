import type { ElementHandle, PageDriver } from '../../browser/driver.js';
import type { EngineSettings } from '../../config/settings.js';
import * as log from '../../utils/logger.js';

// ── Tier contract ────────────────────────────────────────────

/** Shared inputs of every resolution tier. */
export interface ResolveContext {
  driver: PageDriver;
  settings: EngineSettings;
  /** Free-text task, when one was given. */
  task?: string | undefined;
}

export interface TierHit {
  /** What was clicked or filled, for the result and the log. */
  label: string;
  /** Overrides the tier name when a tier reports finer-grained sub-methods. */
  method?: string | undefined;
}

/**
 * One fallback strategy. A tier either completes the interaction and
 * returns a hit, or returns null to hand over to the next tier.
 */
export interface Tier<C extends ResolveContext> {
  readonly name: string;
  /** Predicate gate; a tier that does not apply is skipped without a probe. */
  applies?(ctx: C): boolean;
  attempt(ctx: C): Promise<TierHit | null>;
}

export interface TierWin {
  label: string;
  method: string;
}

/**
 * Run tiers in order until one hits. A tier that throws is logged and
 * counts as a miss.
 */
export async function runTiers<C extends ResolveContext>(
  tiers: readonly Tier<C>[],
  ctx: C,
): Promise<TierWin | null> {
  for (const tier of tiers) {
    if (tier.applies && !tier.applies(ctx)) continue;

    try {
      const hit = await tier.attempt(ctx);
      if (hit) return { label: hit.label, method: hit.method ?? tier.name };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.detail(`${tier.name} failed: ${message.split('\n')[0] ?? message}`);
    }
  }

  return null;
}

// ── Interaction helpers ──────────────────────────────────────

/**
 * Visible within `timeout`, scrolled into view, and still visible after
 * the page settles. Returns false when any probe misses.
 */
export async function reveal(
  ctx: ResolveContext,
  el: ElementHandle,
  timeout: number,
  settleMs: number = ctx.settings.settle.AFTER_SCROLL,
): Promise<boolean> {
  if (!(await el.isVisible(timeout))) return false;
  await el.scrollIntoView(ctx.settings.timeouts.action);
  await ctx.driver.pause(settleMs);
  return el.isVisible(ctx.settings.timeouts.probe);
}

export async function revealAndClick(
  ctx: ResolveContext,
  el: ElementHandle,
  timeout: number,
  settleMs?: number,
): Promise<boolean> {
  if (!(await reveal(ctx, el, timeout, settleMs))) return false;
  await el.click(ctx.settings.timeouts.action);
  return true;
}
