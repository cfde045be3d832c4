import { errors } from 'playwright';
import type { Locator, Page } from 'playwright';

import { TIMEOUTS } from '../config/defaults.js';
import type { ElementHandle, ElementSet, LoadState, PageDriver, SelectorHint } from './driver.js';
import { NavigationError } from './driver.js';
import { resolveFrom, resolveSelector } from './selectors.js';

// Reads of an element that is already known to exist should be quick.
const READ_TIMEOUT = TIMEOUTS.PROBE_TIMEOUT;

// ── Page ─────────────────────────────────────────────────────

/** `PageDriver` over a live Playwright page. */
export class PlaywrightDriver implements PageDriver {
  constructor(readonly page: Page) {}

  url(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }

  async goto(url: string, timeout: number): Promise<void> {
    try {
      await this.page.goto(url, { timeout, waitUntil: 'networkidle' });
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new NavigationError('timeout', 'Navigation timeout');
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new NavigationError('failed', message);
    }
  }

  async waitForLoadState(state: LoadState, timeout: number): Promise<void> {
    await this.page.waitForLoadState(state, { timeout });
  }

  pause(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  find(hint: SelectorHint): ElementSet {
    return new PlaywrightElements(resolveSelector(this.page, hint));
  }
}

// ── Element sets ─────────────────────────────────────────────

class PlaywrightElements implements ElementSet {
  constructor(private readonly locator: Locator) {}

  count(): Promise<number> {
    return this.locator.count();
  }

  first(): ElementHandle {
    return new PlaywrightElement(this.locator.first());
  }

  nth(index: number): ElementHandle {
    return new PlaywrightElement(this.locator.nth(index));
  }
}

// ── Single element ───────────────────────────────────────────

class PlaywrightElement implements ElementHandle {
  constructor(private readonly locator: Locator) {}

  // `Locator.isVisible` returns immediately; waiting for the visible
  // state gives the probe its own bounded timeout.
  isVisible(timeout: number): Promise<boolean> {
    return this.locator
      .waitFor({ state: 'visible', timeout })
      .then(() => true, () => false);
  }

  waitForVisible(timeout: number): Promise<void> {
    return this.locator.waitFor({ state: 'visible', timeout });
  }

  click(timeout: number): Promise<void> {
    return this.locator.click({ timeout });
  }

  fill(value: string, timeout: number): Promise<void> {
    return this.locator.fill(value, { timeout });
  }

  clear(timeout: number): Promise<void> {
    return this.locator.clear({ timeout });
  }

  press(key: string, timeout: number): Promise<void> {
    return this.locator.press(key, { timeout });
  }

  scrollIntoView(timeout: number): Promise<void> {
    return this.locator.scrollIntoViewIfNeeded({ timeout });
  }

  async textContent(): Promise<string> {
    return (await this.locator.textContent({ timeout: READ_TIMEOUT })) ?? '';
  }

  getAttribute(name: string): Promise<string | null> {
    return this.locator.getAttribute(name, { timeout: READ_TIMEOUT });
  }

  inputValue(): Promise<string> {
    return this.locator.inputValue({ timeout: READ_TIMEOUT });
  }

  isFocused(): Promise<boolean> {
    return this.locator.evaluate(
      (el) => el === document.activeElement,
      undefined,
      { timeout: READ_TIMEOUT },
    );
  }

  hasAncestor(selector: string): Promise<boolean> {
    return this.locator.evaluate(
      (el, sel) => (el.parentElement?.closest(sel) ?? null) !== null,
      selector,
      { timeout: READ_TIMEOUT },
    );
  }

  find(hint: SelectorHint): ElementSet {
    return new PlaywrightElements(resolveFrom(this.locator, hint));
  }
}
