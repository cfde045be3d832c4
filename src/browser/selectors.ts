import type { Locator, Page } from 'playwright';

import type { SelectorHint } from './driver.js';

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a SelectorHint to a Playwright Locator.
 *
 *   css          → locator(value)
 *   text         → getByText(value, { exact })
 *   role         → getByRole(role, { name, exact })
 *   label        → getByLabel(value, { exact })
 *   placeholder  → getByPlaceholder(value, { exact })
 *
 * `within` scopes the query to the first match of the outer hint;
 * `hasText` narrows the result with a case-insensitive text filter.
 * No auto-fallback: tiers decide what to try next.
 */
export function resolveSelector(page: Page, hint: SelectorHint): Locator {
  return resolveFrom(page.locator('html'), hint);
}

/** Resolve a hint relative to an existing locator. */
export function resolveFrom(root: Locator, hint: SelectorHint): Locator {
  const scope = hint.within ? resolveFrom(root, hint.within).first() : root;

  const locator = resolveIn(scope, hint);
  return hint.hasText ? locator.filter({ hasText: hint.hasText }) : locator;
}

function resolveIn(root: Locator, hint: SelectorHint): Locator {
  switch (hint.strategy) {
    case 'css':
      return root.locator(hint.value);

    case 'text':
      return root.getByText(hint.value, { exact: hint.exact ?? false });

    case 'role':
      return hint.name !== undefined
        ? root.getByRole(hint.role, { name: hint.name, exact: hint.exact ?? false })
        : root.getByRole(hint.role);

    case 'label':
      return root.getByLabel(hint.value, { exact: hint.exact ?? false });

    case 'placeholder':
      return root.getByPlaceholder(hint.value, { exact: hint.exact ?? false });
  }
}
