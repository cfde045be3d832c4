import type { ElementHandle, ElementSet, SelectorHint } from '../../browser/driver.js';
import { elementLabel } from '../../browser/driver.js';
import { findOpenModal, summarizePage, visibleElements } from '../../browser/summary.js';
import { BUTTON_SELECTOR, CHROME_REGION } from '../../browser/regions.js';
import { LIMITS } from '../../config/defaults.js';
import { matchButton } from '../matcher.js';
import type { ResolveContext, Tier, TierHit } from './tier.js';
import { revealAndClick } from './tier.js';

export interface SubmitContext extends ResolveContext {
  /** Candidate button texts, in priority order. */
  buttons: readonly string[];
}

// ── Vocabulary ───────────────────────────────────────────────

const SEARCH_BOX_SELECTORS = [
  'input[name="q"]',
  'input[name="search"]',
  'input[type="search"]',
  'textarea[name="q"]',
  'textarea[name="search"]',
  'input[aria-label*="Search" i]',
  'input[placeholder*="Search" i]',
  'input[id*="search" i]',
  'input[class*="search" i]',
  'textarea[aria-label*="Search" i]',
  'textarea[placeholder*="Search" i]',
] as const;

const SEARCH_WITH_VALUE_SELECTOR =
  'input[type="search"], input[name*="search" i], input[name="q"], input[aria-label*="Search" i]';

const FORM_BUTTON_SELECTOR =
  'form button, main button, [role="main"] button, [class*="form" i] button, [class*="content" i] button';

const MODAL_BUTTON_SELECTORS = [
  '[role="dialog"] button',
  '.modal button',
  '[class*="modal" i] button',
  '[class*="dialog" i] button',
] as const;

const MODAL_FALLBACK_SELECTOR = '[role="dialog"] button, .modal button, [class*="modal" i] button';

const SUBMIT_TYPE_SELECTOR = 'input[type="submit"], button[type="submit"]';

const ACTION_KEYWORDS = ['Create', 'Save', 'Submit', 'Confirm', 'Add', 'New'] as const;

const DISMISS_WORDS = ['cancel', 'close', 'dismiss', '×'] as const;

const DISMISS_OR_BACK_WORDS = [...DISMISS_WORDS, 'back'] as const;

// ── Helpers ──────────────────────────────────────────────────

function isDismissive(label: string, words: readonly string[] = DISMISS_WORDS): boolean {
  const lower = label.toLowerCase();
  return words.some((w) => lower.includes(w));
}

function inChrome(el: ElementHandle): Promise<boolean> {
  return el.hasAncestor(CHROME_REGION);
}

async function clickSubmitCandidate(ctx: SubmitContext, el: ElementHandle, timeout: number): Promise<boolean> {
  return revealAndClick(ctx, el, timeout, ctx.settings.settle.AFTER_SUBMIT_SCROLL);
}

/** Whether a focused field looks like a search box by its attributes. */
export async function looksLikeSearch(el: ElementHandle): Promise<boolean> {
  const attr = async (name: string): Promise<string> =>
    ((await el.getAttribute(name)) ?? '').toLowerCase();

  const name = await attr('name');
  if ((await attr('type')) === 'search') return true;
  if (name === 'q' || name.includes('search') || name.includes('query')) return true;

  for (const other of ['id', 'placeholder', 'aria-label']) {
    if ((await attr(other)).includes('search')) return true;
  }
  return false;
}

// ── Tier 0: search boxes take Enter ──────────────────────────

async function pressEnterOnSearch(ctx: SubmitContext): Promise<TierHit | null> {
  const { driver, settings } = ctx;
  const { timeouts } = settings;

  for (const selector of SEARCH_BOX_SELECTORS) {
    const box = driver.find({ strategy: 'css', value: selector }).first();
    if (!(await box.isVisible(timeouts.probe))) continue;
    if ((await box.inputValue()) || (await box.isFocused())) {
      await box.press('Enter', timeouts.action);
      return { label: 'Enter key (search)' };
    }
  }

  const fields = driver.find({ strategy: 'css', value: 'input, textarea' });
  const count = Math.min(await fields.count(), LIMITS.MAX_FOCUS_CANDIDATES);
  for (let i = 0; i < count; i++) {
    const field = fields.nth(i);
    if (!(await field.isFocused())) continue;
    if ((await field.isVisible(timeouts.quickProbe)) && (await looksLikeSearch(field))) {
      await field.press('Enter', timeouts.action);
      return { label: 'Enter key (focused search)' };
    }
    break;
  }

  const searchInputs = driver.find({ strategy: 'css', value: SEARCH_WITH_VALUE_SELECTOR });
  for (const input of await visibleElements(searchInputs, LIMITS.MAX_SEARCH_INPUTS, timeouts.quickProbe)) {
    if (await input.inputValue()) {
      await input.press('Enter', timeouts.action);
      return { label: 'Enter key (search with value)' };
    }
  }

  return null;
}

const searchEnter: Tier<SubmitContext> = {
  name: 'search-enter',
  async attempt(ctx) {
    const hit = await pressEnterOnSearch(ctx);
    if (hit) return hit;
    // Let an opening modal or form finish rendering before the button tiers.
    await ctx.driver.pause(ctx.settings.settle.BEFORE_SUBMIT);
    return null;
  },
};

// ── Tier 1: matcher-chosen button ────────────────────────────

const contextAware: Tier<SubmitContext> = {
  name: 'context-aware',
  applies: (ctx) => Boolean(ctx.task),
  async attempt(ctx) {
    if (!ctx.task) return null;
    const summary = await summarizePage(ctx.driver, ctx.settings.timeouts);
    const match = matchButton(summary, ctx.task, ctx.settings.weights);
    if (!match) return null;

    const text = match.button.text;
    const dialog: SelectorHint = { strategy: 'css', value: '[role="dialog"]' };
    const hints: SelectorHint[] = [];

    if (match.button.inModal) {
      hints.push(
        { strategy: 'css', value: MODAL_BUTTON_SELECTORS.join(', '), hasText: text },
        { strategy: 'role', role: 'button', name: text, within: dialog },
        { strategy: 'text', value: text, within: dialog },
      );
    }
    hints.push(
      { strategy: 'text', value: text },
      { strategy: 'role', role: 'button', name: text },
      { strategy: 'css', value: BUTTON_SELECTOR, hasText: text },
    );

    for (const hint of hints) {
      const el = ctx.driver.find(hint).first();
      if (await clickSubmitCandidate(ctx, el, ctx.settings.timeouts.modalProbe)) {
        return { label: text };
      }
    }
    return null;
  },
};

// ── Tier 2: configured candidate texts ───────────────────────

async function firstOutsideChrome(
  set: ElementSet,
  timeout: number,
): Promise<ElementHandle | null> {
  const count = Math.min(await set.count(), LIMITS.MAX_SCANNED_ELEMENTS);
  for (let i = 0; i < count; i++) {
    const el = set.nth(i);
    if ((await el.isVisible(timeout)) && !(await inChrome(el))) return el;
  }
  return null;
}

const candidateText: Tier<SubmitContext> = {
  name: 'candidate-text',
  async attempt(ctx) {
    const { driver } = ctx;
    const { timeouts } = ctx.settings;

    for (const text of ctx.buttons) {
      const passes: { method: string; set: ElementSet; timeout: number }[] = [
        {
          method: 'form-context',
          set: driver.find({ strategy: 'css', value: FORM_BUTTON_SELECTOR, hasText: text }),
          timeout: timeouts.field,
        },
        {
          method: 'filtered-match',
          set: driver.find({ strategy: 'css', value: 'button, [role="button"]', hasText: text }),
          timeout: timeouts.probe,
        },
        {
          method: 'role-exact',
          set: driver.find({ strategy: 'role', role: 'button', name: text, exact: true }),
          timeout: timeouts.field,
        },
        {
          method: 'role-partial',
          set: driver.find({ strategy: 'role', role: 'button', name: text }),
          timeout: timeouts.field,
        },
      ];

      for (const pass of passes) {
        const el = await firstOutsideChrome(pass.set, pass.timeout);
        if (el && (await clickSubmitCandidate(ctx, el, timeouts.probe))) {
          return { label: text, method: pass.method };
        }
      }
    }
    return null;
  },
};

// ── Tier 3: open modal ───────────────────────────────────────

/** Click the first of `candidates` whose label `accept` takes. */
async function scanButtons(
  ctx: SubmitContext,
  candidates: readonly ElementHandle[],
  accept: (el: ElementHandle, label: string) => Promise<boolean>,
): Promise<TierHit | null> {
  for (const el of candidates) {
    const label = await elementLabel(el);
    if (!label || !(await accept(el, label))) continue;
    if (await clickSubmitCandidate(ctx, el, ctx.settings.timeouts.probe)) return { label };
  }
  return null;
}

const modalKeyword: Tier<SubmitContext> = {
  name: 'modal-keyword',
  async attempt(ctx) {
    const { timeouts } = ctx.settings;
    if (!(await findOpenModal(ctx.driver, timeouts.quickProbe))) return null;

    for (const keyword of ACTION_KEYWORDS) {
      for (const selector of MODAL_BUTTON_SELECTORS) {
        const set = ctx.driver.find({ strategy: 'css', value: selector, hasText: keyword });
        const visible = await visibleElements(set, LIMITS.MAX_MODAL_BUTTONS, timeouts.probe);
        const hit = await scanButtons(ctx, visible, async (_el, label) => !isDismissive(label));
        if (hit) return hit;
      }
    }
    return null;
  },
};

const modalFallback: Tier<SubmitContext> = {
  name: 'modal-fallback',
  async attempt(ctx) {
    const { timeouts } = ctx.settings;
    if (!(await findOpenModal(ctx.driver, timeouts.quickProbe))) return null;

    const set = ctx.driver.find({ strategy: 'css', value: MODAL_FALLBACK_SELECTOR });
    const visible = await visibleElements(set, LIMITS.MAX_MODAL_BUTTONS, timeouts.probe);
    return scanButtons(ctx, visible, async (_el, label) => !isDismissive(label, DISMISS_OR_BACK_WORDS));
  },
};

// ── Tier 4: keyword scan, then unrestricted ──────────────────

function keywordScan(name: string, skipChrome: boolean): Tier<SubmitContext> {
  return {
    name,
    async attempt(ctx) {
      const set = ctx.driver.find({ strategy: 'css', value: BUTTON_SELECTOR });
      const visible = await visibleElements(
        set,
        LIMITS.MAX_SCANNED_ELEMENTS,
        ctx.settings.timeouts.quickProbe,
      );

      for (const keyword of ACTION_KEYWORDS) {
        const needle = keyword.toLowerCase();
        const hit = await scanButtons(
          ctx,
          visible,
          async (el, label) =>
            !isDismissive(label) &&
            label.toLowerCase().includes(needle) &&
            !(skipChrome && (await inChrome(el))),
        );
        if (hit) return hit;
      }
      return null;
    },
  };
}

// ── Tier 5: submit-type ──────────────────────────────────────

const submitType: Tier<SubmitContext> = {
  name: 'submit-type',
  async attempt(ctx) {
    const el = ctx.driver.find({ strategy: 'css', value: SUBMIT_TYPE_SELECTOR }).first();
    return (await clickSubmitCandidate(ctx, el, ctx.settings.timeouts.field))
      ? { label: 'submit button' }
      : null;
  },
};

export const SUBMIT_TIERS: readonly Tier<SubmitContext>[] = [
  searchEnter,
  contextAware,
  candidateText,
  modalKeyword,
  modalFallback,
  keywordScan('keyword-match', true),
  keywordScan('keyword-match-fallback', false),
  submitType,
];
