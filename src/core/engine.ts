import type { Action, ActionResult, RawAction } from '../schema/index.js';
import { parseAction, stepLabel } from '../schema/index.js';
import type { PageDriver } from '../browser/driver.js';
import { SessionLostError } from '../browser/driver.js';
import type { EngineSettings } from '../config/settings.js';
import type { SnapshotStore } from '../snapshots/store.js';
import * as log from '../utils/logger.js';
import { executeAction } from './actions.js';
import type { CheckpointOutcome, ResumeSignal } from './checkpoint.js';
import { runAuthCheckpoint } from './checkpoint.js';
import { RunAbortedError, abortError } from './errors.js';

// Actions after which the page may still be loading.
const MUTATING_ACTIONS = new Set(['goto', 'click_by_text', 'click_submit', 'fill_inputs']);

export interface EngineOptions {
  driver: PageDriver;
  store: SnapshotStore;
  settings: EngineSettings;
  resume: ResumeSignal;
  task?: string | undefined;
  signal?: AbortSignal | undefined;
}

/**
 * Runs a plan against one live page, strictly in order, producing one
 * result per action. Failed actions do not stop the run; a lost
 * session or an abort does.
 */
export class ActionEngine {
  private readonly driver: PageDriver;
  private readonly store: SnapshotStore;
  private readonly settings: EngineSettings;
  private readonly resume: ResumeSignal;
  private readonly task: string | undefined;
  private readonly signal: AbortSignal;

  private readonly completed: ActionResult[] = [];
  private loggedIn = false;

  constructor(options: EngineOptions) {
    this.driver = options.driver;
    this.store = options.store;
    this.settings = options.settings;
    this.resume = options.resume;
    this.task = options.task;
    this.signal = options.signal ?? new AbortController().signal;
  }

  /** Results of the actions run so far, also after an abort. */
  get results(): readonly ActionResult[] {
    return this.completed;
  }

  async run(actions: readonly RawAction[]): Promise<ActionResult[]> {
    const total = actions.length;
    log.section(`Executing ${String(total)} actions`);

    log.action(0, total, 'initial state');
    await this.store.captureIfChanged(this.driver, 'initial', true);

    for (const [i, raw] of actions.entries()) {
      if (this.signal.aborted) throw abortError(this.signal);

      await this.step(raw, i + 1, total);
    }

    return [...this.completed];
  }

  private async step(raw: RawAction, index: number, total: number): Promise<void> {
    const { driver, settings } = this;
    const parsed = parseAction(raw);
    const type = parsed.ok ? parsed.action.type : parsed.type;
    log.action(index, total, type);

    let result: ActionResult;
    if (parsed.ok) {
      result = await this.execute(parsed.action);
    } else {
      result = { success: false, action: parsed.type, error: parsed.error };
    }
    this.completed.push(result);

    log.actionResult(
      result.success,
      result.success ? 'Action succeeded' : `Action failed: ${result.error ?? 'Unknown error'}`,
    );

    if (type === 'goto') await this.checkpoint();
    this.ensureSession();
    // Once cancelled, the in-flight state is abandoned rather than captured.
    if (this.signal.aborted) throw abortError(this.signal);

    if (MUTATING_ACTIONS.has(type)) {
      try {
        await driver.waitForLoadState('networkidle', settings.timeouts.networkIdle);
      } catch {
        log.detail('Network still busy; continuing');
      }
    }

    await driver.pause(settings.settle.AFTER_ACTION);
    if (this.signal.aborted) throw abortError(this.signal);
    await this.store.captureIfChanged(driver, stepLabel(type));
  }

  private async execute(action: Action): Promise<ActionResult> {
    try {
      return await executeAction(action, {
        driver: this.driver,
        settings: this.settings,
        task: this.task,
        skipAuthCheck: this.loggedIn,
      });
    } catch (err) {
      this.ensureSession();
      const message = err instanceof Error ? err.message : String(err);
      return { success: false, action: action.type, error: message };
    }
  }

  private async checkpoint(): Promise<void> {
    this.ensureSession();

    let outcome: CheckpointOutcome | null;
    try {
      outcome = await runAuthCheckpoint(this.driver, this.settings, this.resume, this.signal);
    } catch (err) {
      if (err instanceof RunAbortedError) throw err;
      if (this.signal.aborted) throw abortError(this.signal);
      this.ensureSession();

      // A probe that fails mid-redirect counts as no gate.
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Login check failed, continuing: ${message.split('\n')[0] ?? message}`);
      return;
    }
    if (!outcome) return;

    this.loggedIn = true;
    await this.store.captureIfChanged(this.driver, 'after-login', true);
  }

  private ensureSession(): void {
    if (this.driver.isClosed()) throw new SessionLostError();
  }
}
