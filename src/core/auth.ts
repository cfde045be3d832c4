import type { AuthState } from '../schema/index.js';
import type { CheckpointPolicy } from '../schema/config.js';
import type { PageDriver } from '../browser/driver.js';

// ── Vocabulary ───────────────────────────────────────────────

const LOGIN_URL_MARKERS = ['login', 'signin', 'auth', 'oauth'] as const;

const LOGIN_FORM_URL_MARKERS = ['/login', '/signin'] as const;

/** URL paths that mark a dedicated login page for the click pre-check. */
const DEDICATED_LOGIN_PATHS = ['/login', '/signin', '/auth'] as const;

export const LOGIN_BUTTON_PHRASES = [
  'sign in',
  'log in',
  'login',
  'signin',
  'sign in with google',
  'continue with google',
  'get started',
  'sign up',
  'signup',
] as const;

const LOGIN_ARIA_SELECTORS = [
  'button[aria-label*="sign in" i]',
  'button[aria-label*="log in" i]',
  'a[aria-label*="sign in" i]',
  'button[aria-label*="login" i]',
] as const;

const LOGIN_CLASS_SELECTORS = [
  'button[class*="sign-in" i]',
  'button[class*="login" i]',
  'a[class*="sign-in" i]',
  'button[id*="sign-in" i]',
  'button[id*="login" i]',
] as const;

const EMAIL_FIELD_SELECTOR =
  'input[type="email"], input[name*="email" i], input[id*="email" i]';

const PASSWORD_FIELD_SELECTOR = 'input[type="password"]';

// ── Pure classification ──────────────────────────────────────

export interface AuthSignals {
  url: string;
  hasEmailField: boolean;
  hasPasswordField: boolean;
  /** Phrase or tier label of a visible login affordance, if any. */
  loginButtonText: string | null;
}

/**
 * URL markers take precedence; otherwise an email + password form on a
 * login-like path marks a login page. A visible login button without
 * a form means the page gates features behind a login click.
 */
export function classifyAuthState(signals: AuthSignals): AuthState {
  const url = signals.url.toLowerCase();
  const isLoginUrl = LOGIN_URL_MARKERS.some((m) => url.includes(m));
  const hasLoginForm = signals.hasEmailField && signals.hasPasswordField;
  const isLoginPage =
    isLoginUrl ||
    (hasLoginForm && LOGIN_FORM_URL_MARKERS.some((m) => url.includes(m)));
  const hasLoginButton = signals.loginButtonText !== null;

  const state: AuthState = {
    url: signals.url,
    isLoginPage,
    requiresLogin: isLoginPage || (hasLoginButton && !hasLoginForm),
    hasLoginButton,
    hasEmailField: signals.hasEmailField,
    hasPasswordField: signals.hasPasswordField,
  };
  if (signals.loginButtonText !== null) {
    state.loginButtonText = signals.loginButtonText;
  }
  return state;
}

export function isDedicatedLoginUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return DEDICATED_LOGIN_PATHS.some((p) => lower.includes(p));
}

/** `https://example.com` or `https://example.com/`, ignoring query and hash. */
export function isRootUrl(url: string): boolean {
  try {
    return new URL(url).pathname === '/';
  } catch {
    return false;
  }
}

// ── Live detection ───────────────────────────────────────────

export async function detectAuthState(
  driver: PageDriver,
  probeTimeout: number,
): Promise<AuthState> {
  const [emailCount, passwordCount] = await Promise.all([
    driver.find({ strategy: 'css', value: EMAIL_FIELD_SELECTOR }).count(),
    driver.find({ strategy: 'css', value: PASSWORD_FIELD_SELECTOR }).count(),
  ]);

  return classifyAuthState({
    url: driver.url(),
    hasEmailField: emailCount > 0,
    hasPasswordField: passwordCount > 0,
    loginButtonText: await probeLoginButton(driver, probeTimeout),
  });
}

/**
 * Three probe tiers, each bounded by `timeout` per selector: phrase
 * match by role, aria-label substring, then class/id substring.
 */
export async function probeLoginButton(
  driver: PageDriver,
  timeout: number,
): Promise<string | null> {
  for (const phrase of LOGIN_BUTTON_PHRASES) {
    for (const role of ['button', 'link'] as const) {
      const el = driver.find({ strategy: 'role', role, name: phrase }).first();
      if (await el.isVisible(timeout)) return phrase;
    }
  }

  for (const selector of LOGIN_ARIA_SELECTORS) {
    const el = driver.find({ strategy: 'css', value: selector }).first();
    if (await el.isVisible(timeout)) return 'login button (aria-label)';
  }

  for (const selector of LOGIN_CLASS_SELECTORS) {
    const el = driver.find({ strategy: 'css', value: selector }).first();
    if (await el.isVisible(timeout)) return 'login button (class/id)';
  }

  return null;
}

// ── Checkpoint policy ────────────────────────────────────────

export type LoginGateReason = 'login-page' | 'login-button';

/**
 * Whether the checkpoint should pause for a manual login. The two
 * signals are independent switches; `login-page` is reported first
 * when both apply.
 */
export function loginGateReason(
  auth: AuthState,
  policy: CheckpointPolicy,
): LoginGateReason | null {
  if (policy.loginPage && auth.isLoginPage) return 'login-page';

  if (auth.hasLoginButton) {
    switch (policy.loginButton) {
      case 'always':
        return 'login-button';
      case 'root-only':
        return isRootUrl(auth.url) ? 'login-button' : null;
      case 'never':
        return null;
    }
  }

  return null;
}
