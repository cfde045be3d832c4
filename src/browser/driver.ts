// ── Selector hints ───────────────────────────────────────────

export type SelectorStrategy = 'css' | 'text' | 'role' | 'label' | 'placeholder';

export type ElementRole = 'button' | 'link';

interface HintScope {
  /** Restrict the query to the first match of another hint. */
  within?: SelectorHint | undefined;
  /** Keep only elements whose text contains this (case-insensitive). */
  hasText?: string | undefined;
}

export type SelectorHint =
  | ({ strategy: 'css'; value: string } & HintScope)
  | ({ strategy: 'text'; value: string; exact?: boolean | undefined } & HintScope)
  | ({ strategy: 'role'; role: ElementRole; name?: string | undefined; exact?: boolean | undefined } & HintScope)
  | ({ strategy: 'label'; value: string; exact?: boolean | undefined } & HintScope)
  | ({ strategy: 'placeholder'; value: string; exact?: boolean | undefined } & HintScope);

// ── Page driver port ─────────────────────────────────────────
// The narrow surface of a live page the engine relies on. The
// Playwright adapter implements it for real runs; tests supply an
// in-process implementation.

export type LoadState = 'domcontentloaded' | 'networkidle';

export interface PageDriver {
  url(): string;
  title(): Promise<string>;
  content(): Promise<string>;
  isClosed(): boolean;
  /** Throws `NavigationError` on failure. */
  goto(url: string, timeout: number): Promise<void>;
  /** Rejects when the state is not reached within `timeout`. */
  waitForLoadState(state: LoadState, timeout: number): Promise<void>;
  pause(ms: number): Promise<void>;
  screenshot(filePath: string): Promise<void>;
  find(hint: SelectorHint): ElementSet;
}

export interface ElementSet {
  count(): Promise<number>;
  first(): ElementHandle;
  nth(index: number): ElementHandle;
}

export interface ElementHandle {
  /** Bounded probe: resolves false instead of throwing when absent. */
  isVisible(timeout: number): Promise<boolean>;
  /** Rejects when the element is not visible within `timeout`. */
  waitForVisible(timeout: number): Promise<void>;
  click(timeout: number): Promise<void>;
  fill(value: string, timeout: number): Promise<void>;
  clear(timeout: number): Promise<void>;
  press(key: string, timeout: number): Promise<void>;
  scrollIntoView(timeout: number): Promise<void>;
  textContent(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  inputValue(): Promise<string>;
  isFocused(): Promise<boolean>;
  /** True when a strict ancestor (not the element itself) matches `selector`. */
  hasAncestor(selector: string): Promise<boolean>;
  find(hint: SelectorHint): ElementSet;
}

// ── Errors ───────────────────────────────────────────────────

export type NavigationFailureKind = 'timeout' | 'failed';

export class NavigationError extends Error {
  readonly kind: NavigationFailureKind;

  constructor(kind: NavigationFailureKind, message: string) {
    super(message);
    this.name = 'NavigationError';
    this.kind = kind;
  }
}

/** The page or browser is gone; the run cannot continue. */
export class SessionLostError extends Error {
  readonly exitCode = 2;

  constructor(message = 'Browser session was closed') {
    super(message);
    this.name = 'SessionLostError';
  }
}

// ── Helpers ──────────────────────────────────────────────────

/** Visible label of an element: text, else `value`, else aria-label. */
export async function elementLabel(el: ElementHandle): Promise<string> {
  const text = (await el.textContent()).trim();
  if (text) return text;
  const value = (await el.getAttribute('value'))?.trim();
  if (value) return value;
  return (await el.getAttribute('aria-label'))?.trim() ?? '';
}

/** Quote a value for use inside a CSS attribute selector. */
export function cssString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
