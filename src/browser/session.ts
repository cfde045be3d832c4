import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { chromium } from 'playwright';
import type { Browser, BrowserContext } from 'playwright';

import * as log from '../utils/logger.js';
import type { PageDriver } from './driver.js';
import { PlaywrightDriver } from './playwright.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionConfig {
  headless: boolean;
  slowMo: number;
  /** Reuse a browser profile on disk so logins survive between runs. */
  persistentContext: boolean;
  persistentContextDir: string;
  /** "name=value; name2=value2", scoped to `cookieUrl`. */
  cookie?: string | undefined;
  cookieUrl?: string | undefined;
}

export interface BrowserSession {
  readonly driver: PageDriver;
  close(): Promise<void>;
}

export interface CookieParam {
  name: string;
  value: string;
  url: string;
}

// ── Cookie parsing ───────────────────────────────────────────

/**
 * Parse a cookie string ("name=value; name2=value2").
 *
 * Playwright requires a `url` to scope each cookie, so the start
 * URL of the run is used.
 */
export function parseCookies(raw: string, url: string): CookieParam[] {
  return raw
    .split(';')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((pair) => {
      const eqIdx = pair.indexOf('=');
      if (eqIdx === -1) {
        throw new Error(`Invalid cookie format: "${pair}" (expected name=value)`);
      }
      return {
        name: pair.slice(0, eqIdx).trim(),
        value: pair.slice(eqIdx + 1).trim(),
        url,
      };
    });
}

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(config: SessionConfig): Promise<BrowserSession> {
  // Parsed before launch so a malformed cookie leaves no browser behind.
  const cookies =
    config.cookie && config.cookieUrl ? parseCookies(config.cookie, config.cookieUrl) : [];

  const { context, browser } = await openContext(config);
  const close = async (): Promise<void> => {
    await context.close();
    if (browser) await browser.close();
  };

  try {
    if (cookies.length > 0) {
      await context.addCookies(cookies);
      log.detail(`Injected ${String(cookies.length)} cookie(s) for ${config.cookieUrl ?? ''}`);
    }

    const page = context.pages()[0] ?? (await context.newPage());
    return { driver: new PlaywrightDriver(page), close };
  } catch (err) {
    await closeAfterFailure(close);
    throw err;
  }
}

async function closeAfterFailure(close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.detail(`Browser close failed: ${message}`);
  }
}

async function openContext(
  config: SessionConfig,
): Promise<{ context: BrowserContext; browser: Browser | null }> {
  const launchOptions = { headless: config.headless, slowMo: config.slowMo };

  if (config.persistentContext) {
    const dir = path.resolve(config.persistentContextDir);
    try {
      await mkdir(dir, { recursive: true });
      const context = await chromium.launchPersistentContext(dir, launchOptions);
      return { context, browser: null };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Could not create persistent context: ${message}`);
      log.detail('Falling back to a fresh browser context...');
    }
  }

  const browser = await chromium.launch(launchOptions);
  try {
    return { context: await browser.newContext(), browser };
  } catch (err) {
    await closeAfterFailure(() => browser.close());
    throw err;
  }
}
