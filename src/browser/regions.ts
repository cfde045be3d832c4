// Selector vocabulary for page regions shared by the summary builder,
// the auth detector and the resolution tiers.

export const MODAL_SELECTORS = [
  '[role="dialog"]',
  '.modal',
  '[class*="modal" i]',
  '[class*="dialog" i]',
  '[class*="overlay" i]',
] as const;

export const MODAL_REGION = MODAL_SELECTORS.join(', ');

/** Header, navigation and search chrome that submit tiers steer clear of. */
export const CHROME_REGION = [
  'header',
  'nav',
  '[role="banner"]',
  '[class*="header" i]',
  '[class*="nav" i]',
  '[class*="search" i]',
].join(', ');

export const BUTTON_SELECTOR =
  'button, input[type="button"], input[type="submit"], a[role="button"]';

export const CLICKABLE_SELECTOR = 'button, a, [role="button"], [role="link"]';

export const INPUT_SELECTOR = 'input, textarea, [contenteditable="true"]';

export const NAV_LINK_SELECTORS = [
  'nav a',
  '[role="navigation"] a',
  'aside a',
  '[class*="sidebar" i] a',
  '[class*="menu" i] a',
  '[class*="nav" i] a',
] as const;

export const SIDEBAR_CONTAINERS = [
  'nav',
  'aside',
  '[role="navigation"]',
  '[class*="sidebar" i]',
  '[class*="nav" i]',
  '[class*="menu" i]',
] as const;
