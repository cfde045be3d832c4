/**
 * Configuration module.
 * Loads and validates runtime config from config files, then resolves
 * it into engine settings. Zod-validated.
 */

export { TIMEOUTS, SETTLE, LIMITS, MATCHER_WEIGHTS, SUBMIT_BUTTON_TEXTS, OUTPUT } from './defaults.js';
export { loadConfigFile, loadConfigOrDefaults, parseConfig } from './loader.js';
export { defaultEngineSettings, resolveEngineSettings } from './settings.js';
export type { EngineSettings, EngineTimeouts, SettleDelays } from './settings.js';
