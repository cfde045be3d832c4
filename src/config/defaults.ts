/**
 * Default configuration values.
 * All values are overridable via config file.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 30_000,
  ACTION_TIMEOUT: 10_000,
  FIELD_TIMEOUT: 2_000,
  PROBE_TIMEOUT: 1_000,
  QUICK_PROBE_TIMEOUT: 500,
  LABEL_PROBE_TIMEOUT: 100,
  MODAL_PROBE_TIMEOUT: 2_000,
  NETWORK_IDLE_TIMEOUT: 3_000,
  DOM_CONTENT_TIMEOUT: 10_000,
} as const;

/** Pauses that let the page settle; none of them is a failure condition. */
export const SETTLE = {
  AFTER_SCROLL: 300,
  AFTER_SUBMIT_SCROLL: 500,
  BEFORE_SUBMIT: 1_000,
  AFTER_COOKIE_DISMISS: 500,
  AFTER_ACTION: 1_000,
  BEFORE_CAPTURE: 500,
  AFTER_GOTO: 5_000,
  AFTER_LOAD: 2_000,
  AFTER_LOGIN: 3_000,
} as const;

export const LIMITS = {
  MAX_SCANNED_ELEMENTS: 50,
  MAX_SCANNED_LINKS: 30,
  MAX_SCANNED_INPUTS: 30,
  MAX_MODAL_BUTTONS: 20,
  MAX_SEARCH_INPUTS: 5,
  MAX_FOCUS_CANDIDATES: 20,
  MAX_PLANNED_ACTIONS: 30,
} as const;

// Integer bonuses used by the button matcher. They encode product
// judgment and are expected to change; override via `matcher.weights`.
export const MATCHER_WEIGHTS = {
  actionKeyword: 10,
  objectKeyword: 5,
  actionObjectCombo: 15,
  inModal: 25,
  createPreference: 10,
  addPenalty: 5,
} as const;

export const SUBMIT_BUTTON_TEXTS = [
  'Create',
  'New',
  'Add',
  'Save',
  'Submit',
  'Confirm',
  'Search',
  'Google Search',
] as const;

export const OUTPUT = {
  DATASET_ROOT: 'dataset',
  PERSISTENT_CONTEXT_DIR: '.browser_context',
  CONFIG_FILE: '.flowshot.yaml',
  SLOW_MO: 300,
} as const;
