import type { AuthState } from '../schema/index.js';
import type { PageDriver } from '../browser/driver.js';
import type { EngineSettings } from '../config/settings.js';
import * as log from '../utils/logger.js';
import type { LoginGateReason } from './auth.js';
import { detectAuthState, loginGateReason } from './auth.js';

// ── Public types ─────────────────────────────────────────────

export interface LoginGate {
  reason: LoginGateReason;
  auth: AuthState;
}

/**
 * Blocks until a human signals that the manual login is done. The
 * promise must reject once `signal` aborts.
 */
export interface ResumeSignal {
  waitForResume(gate: LoginGate, signal: AbortSignal): Promise<void>;
}

export interface CheckpointOutcome {
  gate: LoginGate;
  /** Auth state re-read after the human resumed. */
  after: AuthState;
}

// ── Checkpoint ───────────────────────────────────────────────

/**
 * Settle after navigation, then pause for a manual login when the
 * page is gated. Returns null when no login was needed.
 */
export async function runAuthCheckpoint(
  driver: PageDriver,
  settings: EngineSettings,
  resume: ResumeSignal,
  signal: AbortSignal,
): Promise<CheckpointOutcome | null> {
  const { timeouts, settle } = settings;

  await driver.pause(settle.AFTER_GOTO);
  try {
    await driver.waitForLoadState('domcontentloaded', timeouts.domContent);
  } catch {
    log.detail('Page still loading; checking for a login gate anyway');
  }
  await driver.pause(settle.AFTER_LOAD);

  const auth = await detectAuthState(driver, timeouts.probe);
  const reason = loginGateReason(auth, settings.checkpoint);
  if (!reason) return null;

  const gate: LoginGate = { reason, auth };
  announce(gate);
  await resume.waitForResume(gate, signal);
  await driver.pause(settle.AFTER_LOGIN);

  const after = await detectAuthState(driver, timeouts.probe);
  if (after.requiresLogin) {
    log.warn('Still appears to require login. Continuing anyway...');
  } else {
    log.login('Login detected! Continuing with task...');
  }

  return { gate, after };
}

function announce(gate: LoginGate): void {
  log.section('🔐 LOGIN REQUIRED');
  log.detail(`Detected at: ${gate.auth.url}`);

  if (gate.reason === 'login-button') {
    log.detail(`Found login button: '${gate.auth.loginButtonText ?? 'login'}'`);
    log.detail('Please click the login button and complete authentication.');
  } else {
    log.detail('Detected login page.');
    log.detail('Please log in manually in the browser window.');
  }
}
