import { describe, it, expect } from 'vitest';

import {
  classifyAuthState,
  detectAuthState,
  isDedicatedLoginUrl,
  isRootUrl,
  loginGateReason,
  probeLoginButton,
} from '../../src/core/auth.js';
import type { AuthState } from '../../src/schema/index.js';
import { DomDriver, page } from '../helpers/dom-driver.js';

describe('classifyAuthState', () => {
  it('should flag a login URL with a login form', () => {
    expect(
      classifyAuthState({
        url: 'https://app.example.com/login',
        hasEmailField: true,
        hasPasswordField: true,
        loginButtonText: null,
      }),
    ).toEqual({
      url: 'https://app.example.com/login',
      isLoginPage: true,
      requiresLogin: true,
      hasLoginButton: false,
      hasEmailField: true,
      hasPasswordField: true,
    });
  });

  it('should require login for a bare login button', () => {
    const state = classifyAuthState({
      url: 'https://example.com/',
      hasEmailField: false,
      hasPasswordField: false,
      loginButtonText: 'sign in',
    });

    expect(state.isLoginPage).toBe(false);
    expect(state.requiresLogin).toBe(true);
    expect(state.loginButtonText).toBe('sign in');
  });

  it('should not require login for a button beside an inline form', () => {
    const state = classifyAuthState({
      url: 'https://example.com/pricing',
      hasEmailField: true,
      hasPasswordField: true,
      loginButtonText: 'log in',
    });

    expect(state.isLoginPage).toBe(false);
    expect(state.requiresLogin).toBe(false);
  });

  it('should treat any auth marker in the URL as a login page', () => {
    const state = classifyAuthState({
      url: 'https://accounts.example.com/oauth/authorize',
      hasEmailField: false,
      hasPasswordField: false,
      loginButtonText: null,
    });

    expect(state.isLoginPage).toBe(true);
  });
});

describe('URL helpers', () => {
  it('should recognise dedicated login paths', () => {
    expect(isDedicatedLoginUrl('https://app.example.com/signin?next=/')).toBe(true);
    expect(isDedicatedLoginUrl('https://app.example.com/projects')).toBe(false);
  });

  it('should recognise the site root', () => {
    expect(isRootUrl('https://example.com')).toBe(true);
    expect(isRootUrl('https://example.com/?ref=home')).toBe(true);
    expect(isRootUrl('https://example.com/docs')).toBe(false);
    expect(isRootUrl('not a url')).toBe(false);
  });
});

describe('probeLoginButton', () => {
  it('should report the matching phrase for a login button', async () => {
    const driver = new DomDriver(page('<header><button>Log in</button></header>'));
    expect(await probeLoginButton(driver, 100)).toBe('log in');
  });

  it('should fall back to aria-label substrings', async () => {
    const driver = new DomDriver(page('<a aria-label="Sign in now"><svg></svg></a>'));
    expect(await probeLoginButton(driver, 100)).toBe('login button (aria-label)');
  });

  it('should fall back to class and id substrings', async () => {
    const driver = new DomDriver(page('<button class="btn-login"><svg></svg></button>'));
    expect(await probeLoginButton(driver, 100)).toBe('login button (class/id)');
  });

  it('should ignore hidden login buttons', async () => {
    const driver = new DomDriver(page('<button hidden>Sign in</button><p>Welcome back</p>'));
    expect(await probeLoginButton(driver, 100)).toBeNull();
  });
});

describe('detectAuthState', () => {
  it('should detect a login page from the live document', async () => {
    const driver = new DomDriver(
      page('<form><input type="email" name="email"><input type="password"><button>Continue</button></form>'),
      { url: 'https://app.example.com/login' },
    );

    expect(await detectAuthState(driver, 100)).toEqual({
      url: 'https://app.example.com/login',
      isLoginPage: true,
      requiresLogin: true,
      hasLoginButton: false,
      hasEmailField: true,
      hasPasswordField: true,
    });
  });

  it('should see a dashboard as logged in', async () => {
    const driver = new DomDriver(page('<nav><a href="/projects">Projects</a></nav><h1>Dashboard</h1>'));
    const state = await detectAuthState(driver, 100);

    expect(state.requiresLogin).toBe(false);
    expect(state.hasLoginButton).toBe(false);
  });
});

describe('loginGateReason', () => {
  const base: AuthState = {
    url: 'https://example.com/',
    isLoginPage: false,
    requiresLogin: true,
    hasLoginButton: true,
    loginButtonText: 'sign in',
    hasEmailField: false,
    hasPasswordField: false,
  };

  it('should report a login page before a login button', () => {
    const auth = { ...base, url: 'https://example.com/login', isLoginPage: true };
    expect(loginGateReason(auth, { loginPage: true, loginButton: 'always' })).toBe('login-page');
  });

  it('should gate on a login button by default', () => {
    expect(loginGateReason(base, { loginPage: true, loginButton: 'always' })).toBe('login-button');
  });

  it('should gate on a login button only at the root when asked', () => {
    const deep = { ...base, url: 'https://example.com/docs' };
    const policy = { loginPage: true, loginButton: 'root-only' } as const;

    expect(loginGateReason(base, policy)).toBe('login-button');
    expect(loginGateReason(deep, policy)).toBeNull();
  });

  it('should honour disabled triggers', () => {
    const auth = { ...base, isLoginPage: true };
    expect(loginGateReason(auth, { loginPage: false, loginButton: 'never' })).toBeNull();
  });
});
