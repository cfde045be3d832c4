import { elementLabel } from '../../browser/driver.js';
import { collectNavigation, visibleElements } from '../../browser/summary.js';
import { CLICKABLE_SELECTOR, SIDEBAR_CONTAINERS } from '../../browser/regions.js';
import { LIMITS } from '../../config/defaults.js';
import { matchNavigation } from '../matcher.js';
import type { ResolveContext, Tier } from './tier.js';
import { revealAndClick } from './tier.js';

export interface ClickContext extends ResolveContext {
  text: string;
}

/** Words that name a navigation section rather than a control. */
const CATEGORY_WORDS = new Set(['projects', 'issues', 'tasks', 'pages', 'documents']);

// ── Tiers ────────────────────────────────────────────────────

const contextAware: Tier<ClickContext> = {
  name: 'context-aware',
  applies: (ctx) => Boolean(ctx.task) && CATEGORY_WORDS.has(ctx.text.toLowerCase()),
  async attempt(ctx) {
    if (!ctx.task) return null;
    const links = await collectNavigation(ctx.driver, ctx.settings.timeouts);
    const match = matchNavigation(links, ctx.task);
    if (!match || match.text.toLowerCase() !== ctx.text.toLowerCase()) return null;

    const el = ctx.driver.find({ strategy: 'text', value: match.text }).first();
    if (!(await revealAndClick(ctx, el, ctx.settings.timeouts.action))) return null;
    return { label: match.text };
  },
};

const textMatch: Tier<ClickContext> = {
  name: 'text-match',
  async attempt(ctx) {
    const el = ctx.driver.find({ strategy: 'text', value: ctx.text }).first();
    if (!(await revealAndClick(ctx, el, ctx.settings.timeouts.action))) return null;
    return { label: ctx.text };
  },
};

function byRole(role: 'button' | 'link'): Tier<ClickContext> {
  return {
    name: `role-${role}`,
    async attempt(ctx) {
      const el = ctx.driver.find({ strategy: 'role', role, name: ctx.text }).first();
      if (!(await revealAndClick(ctx, el, ctx.settings.timeouts.action))) return null;
      return { label: ctx.text };
    },
  };
}

const sidebar: Tier<ClickContext> = {
  name: 'sidebar',
  async attempt(ctx) {
    for (const container of SIDEBAR_CONTAINERS) {
      const region = ctx.driver.find({ strategy: 'css', value: container }).first();
      if (!(await region.isVisible(ctx.settings.timeouts.probe))) continue;

      const el = region.find({ strategy: 'text', value: ctx.text }).first();
      if (await revealAndClick(ctx, el, ctx.settings.timeouts.action)) {
        return { label: ctx.text };
      }
    }
    return null;
  },
};

// "New" should reach a "New repository" button.
const partialMatch: Tier<ClickContext> = {
  name: 'partial-match',
  applies: (ctx) => ctx.text.trim().split(/\s+/).length === 1,
  async attempt(ctx) {
    const needle = ctx.text.trim().toLowerCase();
    const clickables = ctx.driver.find({ strategy: 'css', value: CLICKABLE_SELECTOR });
    const visible = await visibleElements(
      clickables,
      LIMITS.MAX_SCANNED_ELEMENTS,
      ctx.settings.timeouts.quickProbe,
    );

    for (const el of visible) {
      const label = await elementLabel(el);
      if (!label || !label.toLowerCase().includes(needle)) continue;
      if (await revealAndClick(ctx, el, ctx.settings.timeouts.probe)) return { label };
    }
    return null;
  },
};

export const CLICK_TIERS: readonly Tier<ClickContext>[] = [
  contextAware,
  textMatch,
  byRole('button'),
  byRole('link'),
  sidebar,
  partialMatch,
];
