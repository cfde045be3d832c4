import { beforeEach, describe, it, expect, vi } from 'vitest';

import { launchSession, parseCookies } from '../../src/browser/session.js';
import type { SessionConfig } from '../../src/browser/session.js';

const pw = vi.hoisted(() => {
  const context = {
    addCookies: vi.fn(async (_cookies: unknown[]) => undefined),
    pages: vi.fn((): unknown[] => []),
    newPage: vi.fn(async () => ({})),
    close: vi.fn(async () => undefined),
  };
  const browser = {
    newContext: vi.fn(async () => context),
    close: vi.fn(async () => undefined),
  };
  return { context, browser, launch: vi.fn(async () => browser) };
});

vi.mock('playwright', () => ({
  chromium: { launch: pw.launch, launchPersistentContext: vi.fn() },
  errors: { TimeoutError: class TimeoutError extends Error {} },
}));

const START_URL = 'https://tracker.example.com';

const CONFIG: SessionConfig = {
  headless: true,
  slowMo: 0,
  persistentContext: false,
  persistentContextDir: '.flowshot/profile',
  cookieUrl: START_URL,
};

describe('parseCookies', () => {
  it('should split a cookie header into cookies scoped to the url', () => {
    expect(parseCookies('sid=test-secret; theme=dark;', START_URL)).toEqual([
      { name: 'sid', value: 'test-secret', url: START_URL },
      { name: 'theme', value: 'dark', url: START_URL },
    ]);
  });

  it('should keep equals signs inside the value', () => {
    expect(parseCookies('token=a=b=c', START_URL)).toEqual([{ name: 'token', value: 'a=b=c', url: START_URL }]);
  });

  it('should reject a pair without a value', () => {
    expect(() => parseCookies('novalue', START_URL)).toThrow(
      'Invalid cookie format: "novalue" (expected name=value)',
    );
  });
});

describe('launchSession', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should inject cookies and close context and browser together', async () => {
    const session = await launchSession({ ...CONFIG, cookie: 'sid=test-secret' });

    expect(pw.context.addCookies).toHaveBeenCalledWith([
      { name: 'sid', value: 'test-secret', url: START_URL },
    ]);
    await session.close();
    expect(pw.context.close).toHaveBeenCalledTimes(1);
    expect(pw.browser.close).toHaveBeenCalledTimes(1);
  });

  it('should not launch a browser for a malformed cookie', async () => {
    await expect(launchSession({ ...CONFIG, cookie: 'not-a-cookie' })).rejects.toThrow(
      'Invalid cookie format',
    );
    expect(pw.launch).not.toHaveBeenCalled();
  });

  it('should close the browser when setting up the page fails', async () => {
    pw.context.addCookies.mockRejectedValueOnce(new Error('Cookie rejected'));

    await expect(launchSession({ ...CONFIG, cookie: 'sid=test-secret' })).rejects.toThrow(
      'Cookie rejected',
    );
    expect(pw.context.close).toHaveBeenCalledTimes(1);
    expect(pw.browser.close).toHaveBeenCalledTimes(1);
  });
});
