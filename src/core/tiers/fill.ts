import type { ElementHandle, SelectorHint } from '../../browser/driver.js';
import { cssString } from '../../browser/driver.js';
import { collectInputs } from '../../browser/summary.js';
import * as log from '../../utils/logger.js';
import { matchInput } from '../matcher.js';
import type { ResolveContext, Tier } from './tier.js';

export interface FieldContext extends ResolveContext {
  field: string;
  value: string;
}

// ── Field classes ────────────────────────────────────────────

export const SEARCH_FIELDS = new Set(['q', 'search', 'query']);

const CODE_FIELDS = new Set(['code', 'editor', 'solution']);

export function isSearchField(field: string): boolean {
  return SEARCH_FIELDS.has(field.toLowerCase());
}

const CODE_EDITOR_SELECTORS = [
  '[contenteditable="true"]',
  'textarea[class*="editor" i]',
  'textarea[class*="code" i]',
  'div[class*="editor" i][contenteditable]',
  'div[class*="code" i][contenteditable]',
  'textarea',
  '[role="textbox"]',
] as const;

const SEARCH_INPUT_SELECTORS = [
  'input[name="q"]',
  'input[name="search"]',
  'input[name="search_query"]',
  'textarea[name="q"]',
  'textarea[name="search"]',
  'input[type="search"]',
  'input[aria-label*="Search" i]',
  'input[placeholder*="Search" i]',
  'input[id*="search" i]',
  'textarea[aria-label*="Search" i]',
  'textarea[placeholder*="Search" i]',
] as const;

const TEXT_INPUT_SELECTOR = 'input[type="text"], input[type="search"], textarea';

const COOKIE_CONSENT_HINTS: readonly SelectorHint[] = [
  { strategy: 'css', value: 'button', hasText: 'Accept' },
  { strategy: 'css', value: 'button', hasText: 'I agree' },
  { strategy: 'css', value: 'button', hasText: 'Accept all' },
  { strategy: 'css', value: '[aria-label*="Accept" i]' },
  { strategy: 'css', value: '[aria-label*="I agree" i]' },
  { strategy: 'css', value: 'button[id*="accept" i]' },
  { strategy: 'css', value: 'button[class*="accept" i]' },
];

// ── Helpers ──────────────────────────────────────────────────

async function fillIfVisible(
  ctx: FieldContext,
  el: ElementHandle,
  options: { clear?: boolean } = {},
): Promise<boolean> {
  const { timeouts } = ctx.settings;
  if (!(await el.isVisible(timeouts.field))) return false;

  await el.click(timeouts.action);
  if (options.clear) await el.clear(timeouts.action);
  await el.fill(ctx.value, timeouts.action);
  return true;
}

function css(ctx: FieldContext, selector: string): ElementHandle {
  return ctx.driver.find({ strategy: 'css', value: selector }).first();
}

// ── Tiers ────────────────────────────────────────────────────

const contextAware: Tier<FieldContext> = {
  name: 'context-aware',
  applies: (ctx) => Boolean(ctx.task),
  async attempt(ctx) {
    const inputs = await collectInputs(ctx.driver, ctx.settings.timeouts);
    const match = matchInput(inputs, ctx.field);
    if (!match) return null;

    if (match.name) {
      const name = cssString(match.name);
      if (await fillIfVisible(ctx, css(ctx, `input[name=${name}], textarea[name=${name}]`))) {
        return { label: `name=${match.name}` };
      }
    }

    if (match.label) {
      const el = ctx.driver.find({ strategy: 'label', value: match.label }).first();
      if (await fillIfVisible(ctx, el)) return { label: `label=${match.label}` };
    }

    return null;
  },
};

const codeEditor: Tier<FieldContext> = {
  name: 'code-editor',
  applies: (ctx) => CODE_FIELDS.has(ctx.field.toLowerCase()),
  async attempt(ctx) {
    for (const selector of CODE_EDITOR_SELECTORS) {
      if (await fillIfVisible(ctx, css(ctx, selector), { clear: true })) {
        return { label: selector };
      }
    }
    return null;
  },
};

const search: Tier<FieldContext> = {
  name: 'search',
  applies: (ctx) => isSearchField(ctx.field),
  async attempt(ctx) {
    for (const selector of SEARCH_INPUT_SELECTORS) {
      if (await fillIfVisible(ctx, css(ctx, selector))) return { label: selector };
    }
    return null;
  },
};

function byHint(
  name: string,
  hint: (field: string) => SelectorHint,
): Tier<FieldContext> {
  return {
    name,
    async attempt(ctx) {
      const el = ctx.driver.find(hint(ctx.field)).first();
      return (await fillIfVisible(ctx, el)) ? { label: ctx.field } : null;
    },
  };
}

const firstTextInput: Tier<FieldContext> = {
  name: 'first-text-input',
  async attempt(ctx) {
    return (await fillIfVisible(ctx, css(ctx, TEXT_INPUT_SELECTOR)))
      ? { label: TEXT_INPUT_SELECTOR }
      : null;
  },
};

export const FILL_TIERS: readonly Tier<FieldContext>[] = [
  contextAware,
  codeEditor,
  search,
  byHint('label', (field) => ({ strategy: 'label', value: field })),
  byHint('placeholder', (field) => ({ strategy: 'placeholder', value: field })),
  byHint('name-attribute', (field) => ({
    strategy: 'css',
    value: `input[name*=${cssString(field)} i], textarea[name*=${cssString(field)} i]`,
  })),
  byHint('id-attribute', (field) => ({
    strategy: 'css',
    value: `input[id*=${cssString(field)} i], textarea[id*=${cssString(field)} i]`,
  })),
  firstTextInput,
];

// ── Cookie consent ───────────────────────────────────────────

/** Click the first visible consent button, if any. Returns whether one was clicked. */
export async function dismissCookieBanner(ctx: ResolveContext): Promise<boolean> {
  const { timeouts, settle } = ctx.settings;

  for (const hint of COOKIE_CONSENT_HINTS) {
    const button = ctx.driver.find(hint).first();
    if (!(await button.isVisible(timeouts.probe))) continue;

    try {
      await button.click(timeouts.action);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.detail(`Cookie banner click failed: ${message.split('\n')[0] ?? message}`);
      continue;
    }
    await ctx.driver.pause(settle.AFTER_COOKIE_DISMISS);
    log.detail('Dismissed cookie banner');
    return true;
  }

  return false;
}
