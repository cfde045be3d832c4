import type { CheckpointPolicy, FileConfig, MatcherWeights } from '../schema/config.js';
import { MATCHER_WEIGHTS, SETTLE, SUBMIT_BUTTON_TEXTS, TIMEOUTS } from './defaults.js';

// ── Resolved engine settings ─────────────────────────────────

export interface EngineTimeouts {
  navigation: number;
  action: number;
  field: number;
  probe: number;
  quickProbe: number;
  labelProbe: number;
  modalProbe: number;
  networkIdle: number;
  domContent: number;
}

export type SettleDelays = Record<keyof typeof SETTLE, number>;

export interface EngineSettings {
  timeouts: EngineTimeouts;
  settle: SettleDelays;
  weights: MatcherWeights;
  submitButtonTexts: readonly string[];
  dismissCookieBanners: boolean;
  checkpoint: CheckpointPolicy;
}

export function defaultEngineSettings(): EngineSettings {
  return {
    timeouts: {
      navigation: TIMEOUTS.NAVIGATION_TIMEOUT,
      action: TIMEOUTS.ACTION_TIMEOUT,
      field: TIMEOUTS.FIELD_TIMEOUT,
      probe: TIMEOUTS.PROBE_TIMEOUT,
      quickProbe: TIMEOUTS.QUICK_PROBE_TIMEOUT,
      labelProbe: TIMEOUTS.LABEL_PROBE_TIMEOUT,
      modalProbe: TIMEOUTS.MODAL_PROBE_TIMEOUT,
      networkIdle: TIMEOUTS.NETWORK_IDLE_TIMEOUT,
      domContent: TIMEOUTS.DOM_CONTENT_TIMEOUT,
    },
    settle: { ...SETTLE },
    weights: { ...MATCHER_WEIGHTS },
    submitButtonTexts: [...SUBMIT_BUTTON_TEXTS],
    dismissCookieBanners: true,
    checkpoint: { loginPage: true, loginButton: 'always' },
  };
}

/** Merge a validated file config over the built-in defaults. */
export function resolveEngineSettings(config: FileConfig): EngineSettings {
  const base = defaultEngineSettings();
  const t = config.timeouts;

  return {
    ...base,
    timeouts: {
      ...base.timeouts,
      navigation: t.navigation ?? base.timeouts.navigation,
      action: t.action ?? base.timeouts.action,
      field: t.field ?? base.timeouts.field,
      probe: t.probe ?? base.timeouts.probe,
      networkIdle: t.networkIdle ?? base.timeouts.networkIdle,
    },
    weights: config.matcher.weights,
    submitButtonTexts: config.submitButtonTexts,
    dismissCookieBanners: config.dismissCookieBanners,
    checkpoint: config.auth.checkpoint,
  };
}
