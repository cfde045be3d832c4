/**
 * Browser module.
 * The page driver port, its Playwright adapter, session launch, and
 * bounded probes that summarize a live page. No LLM calls.
 */

export { NavigationError, SessionLostError, elementLabel, cssString } from './driver.js';
export type {
  PageDriver,
  ElementSet,
  ElementHandle,
  SelectorHint,
  SelectorStrategy,
  ElementRole,
  LoadState,
  NavigationFailureKind,
} from './driver.js';
export { resolveSelector } from './selectors.js';
export { PlaywrightDriver } from './playwright.js';
export { launchSession, parseCookies } from './session.js';
export type { SessionConfig, BrowserSession, CookieParam } from './session.js';
export { summarizePage, findOpenModal } from './summary.js';
