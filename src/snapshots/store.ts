import { mkdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { PageDriver } from '../browser/driver.js';
import type { CaptureSummary, CapturedState } from '../schema/index.js';
import { SETTLE } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { padIndex } from '../utils/slug.js';
import { fingerprint } from './fingerprint.js';

// ── Public types ─────────────────────────────────────────────

export type CaptureOutcome =
  | { status: 'captured'; state: CapturedState }
  | { status: 'skipped'; hash: string }
  | { status: 'failed'; error: string };

export interface SnapshotStoreOptions {
  datasetRoot: string;
  taskSlug: string;
  /** Pause before reading the page. */
  settleMs?: number | undefined;
  /** Clock for record timestamps. */
  now?: (() => Date) | undefined;
}

// ── Store ────────────────────────────────────────────────────

/**
 * Append-only sequence of captured states for one task. A state is
 * skipped when its markup fingerprint equals the previous capture's,
 * unless forced. The index, last hash and record list advance only
 * after the screenshot and the metadata file are both on disk, so
 * indices stay gap-free across failed captures.
 */
export class SnapshotStore {
  readonly taskDir: string;
  private readonly taskSlug: string;
  private readonly settleMs: number;
  private readonly now: () => Date;

  private index = 0;
  private lastHash: string | null = null;
  private readonly states: CapturedState[] = [];

  private constructor(options: SnapshotStoreOptions) {
    this.taskSlug = options.taskSlug;
    this.taskDir = path.join(options.datasetRoot, options.taskSlug);
    this.settleMs = options.settleMs ?? SETTLE.BEFORE_CAPTURE;
    this.now = options.now ?? (() => new Date());
  }

  /** Create the task directory and an empty store over it. */
  static async open(options: SnapshotStoreOptions): Promise<SnapshotStore> {
    const store = new SnapshotStore(options);
    await mkdir(store.taskDir, { recursive: true });
    return store;
  }

  async captureIfChanged(
    page: PageDriver,
    step: string,
    force = false,
  ): Promise<CaptureOutcome> {
    try {
      await page.pause(this.settleMs);

      const hash = fingerprint(await page.content());
      if (!force && hash === this.lastHash) {
        log.skipped(step);
        return { status: 'skipped', hash };
      }

      const index = this.index + 1;
      const base = `${padIndex(index)}_${step}`;
      const state: CapturedState = {
        index,
        url: page.url(),
        timestamp: this.now().toISOString(),
        dom_hash: hash,
        step,
        screenshot: `${base}.png`,
      };

      await page.screenshot(path.join(this.taskDir, state.screenshot));
      await writeJsonAtomic(path.join(this.taskDir, `${base}.json`), state);

      this.index = index;
      this.lastHash = hash;
      this.states.push(state);

      log.captured(index, step, hash);
      return { status: 'captured', state };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Error capturing state: ${message}`);
      return { status: 'failed', error: message };
    }
  }

  /** Records captured so far, in index order. */
  captured(): readonly CapturedState[] {
    return this.states;
  }

  summary(): CaptureSummary {
    return {
      taskSlug: this.taskSlug,
      totalStates: this.index,
      taskDir: this.taskDir,
      states: [...this.states],
    };
  }
}

// ── Helpers ──────────────────────────────────────────────────

async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const tmp = `${filePath}.tmp`;
  await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  await rename(tmp, filePath);
}
