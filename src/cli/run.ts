import { randomUUID } from 'node:crypto';
import path from 'node:path';

import type { Command } from 'commander';

import type { RawAction, RunReport } from '../schema/index.js';
import { computeExitCode, rawActionType } from '../schema/index.js';
import type { FileConfig } from '../schema/config.js';
import { OUTPUT } from '../config/defaults.js';
import { loadConfigOrDefaults } from '../config/loader.js';
import { resolveEngineSettings } from '../config/settings.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';
import { launchSession } from '../browser/session.js';
import { SessionLostError } from '../browser/driver.js';
import { ActionEngine } from '../core/engine.js';
import { RunAbortedError } from '../core/errors.js';
import { PlannerError, loadPlanFile, plan } from '../core/planner.js';
import { SnapshotStore } from '../snapshots/store.js';
import { generateJSON, serializeJSON, writeReports } from '../report/reporter.js';
import type { WrittenReport } from '../report/reporter.js';
import * as log from '../utils/logger.js';
import { slugify } from '../utils/slug.js';
import { createStdinResume } from './resume.js';

// ── Exit codes ───────────────────────────────────────────────

const EXIT_FAILURE = 1;
const EXIT_CONFIG = 4;

// ── Option shapes ────────────────────────────────────────────

interface CaptureOptions {
  plan?: string;
  config: string;
  output?: string;
  headless?: true;
  json?: true;
}

interface PlanOptions {
  config: string;
}

// ── Shared steps ─────────────────────────────────────────────

class UsageError extends Error {
  readonly exitCode = EXIT_CONFIG;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

async function loadConfig(configPath: string): Promise<FileConfig> {
  try {
    return await loadConfigOrDefaults(configPath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new UsageError(`Config error: ${message}`);
  }
}

async function resolvePlan(
  task: string,
  config: FileConfig,
  planPath: string | undefined,
): Promise<RawAction[]> {
  if (planPath !== undefined) {
    try {
      const actions = await loadPlanFile(planPath);
      log.planned(actions.length, path.basename(planPath));
      return actions;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new UsageError(`Plan file error: ${message}`);
    }
  }

  let client: LLMClient | null;
  try {
    client = createLLMClient(loadLLMConfig(config.llm));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new UsageError(`LLM config error: ${message}`);
  }
  return (await plan(task, client)).actions;
}

/** The first goto target, which scopes injected cookies. */
function firstGotoUrl(actions: readonly RawAction[]): string | undefined {
  for (const action of actions) {
    const url = action['url'];
    if (rawActionType(action) === 'goto' && typeof url === 'string') return url;
  }
  return undefined;
}

function exitCodeOf(err: unknown): number {
  if (err instanceof UsageError || err instanceof PlannerError) return err.exitCode;
  return EXIT_FAILURE;
}

// ── Capture ──────────────────────────────────────────────────

async function runCapture(task: string, opts: CaptureOptions): Promise<number> {
  const config = await loadConfig(opts.config);
  const settings = resolveEngineSettings(config);
  const actions = await resolvePlan(task, config, opts.plan);

  const taskSlug = slugify(task) || 'task';
  const store = await SnapshotStore.open({
    datasetRoot: path.resolve(opts.output ?? config.outputDir),
    taskSlug,
  });
  log.info(`Capturing into ${store.taskDir}`);

  const session = await launchSession({
    headless: opts.headless ?? config.headless,
    slowMo: config.slowMo,
    persistentContext: config.persistentContext,
    persistentContextDir: config.persistentContextDir,
    cookie: config.auth.cookie,
    cookieUrl: firstGotoUrl(actions),
  });

  const controller = new AbortController();
  const interrupt = (): void => {
    if (controller.signal.aborted) return;
    log.warn('Interrupted; stopping after the current step (Ctrl+C again to quit now)...');
    controller.abort(new RunAbortedError('Interrupted by user'));
  };
  // Once only: a second Ctrl+C falls through to Node's default and exits.
  process.once('SIGINT', interrupt);

  const engine = new ActionEngine({
    driver: session.driver,
    store,
    settings,
    resume: createStdinResume(interrupt),
    task,
    signal: controller.signal,
  });

  const startedAt = new Date();
  let abortReason: string | undefined;

  try {
    await engine.run(actions);
  } catch (err) {
    if (!(err instanceof RunAbortedError || err instanceof SessionLostError)) throw err;
    abortReason = err.message;
    log.error(err.message);
  } finally {
    process.off('SIGINT', interrupt);
    await closeQuietly(() => session.close());
  }

  const finishedAt = new Date();
  const report: RunReport = {
    runId: randomUUID(),
    task,
    taskSlug,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    aborted: abortReason !== undefined,
    results: [...engine.results],
    capture: store.summary(),
  };
  if (abortReason !== undefined) report.abortReason = abortReason;

  const exitCode = computeExitCode(report);
  const written = await writeReports(report, exitCode);

  if (opts.json) {
    process.stdout.write(serializeJSON(generateJSON(report, exitCode)) + '\n');
  }
  printSummary(report, written);

  return exitCode;
}

async function closeQuietly(close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.detail(`Browser already closed: ${message}`);
  }
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(report: RunReport, written: WrittenReport): void {
  const succeeded = report.results.filter((r) => r.success).length;

  log.section('Run complete');
  log.detail(`Task:     ${report.task}`);
  log.detail(`Actions:  ${String(succeeded)}/${String(report.results.length)} succeeded`);
  log.detail(`States:   ${String(report.capture.totalStates)} captured in ${report.capture.taskDir}`);
  log.detail(`Time:     ${(report.durationMs / 1000).toFixed(1)}s`);
  log.detail(`Report:   ${written.markdownPath}`);
  log.detail(`Run ID:   ${report.runId}`);
}

// ── Command registration ─────────────────────────────────────

export function registerCaptureCommand(program: Command): void {
  program
    .command('capture')
    .description('Plan and execute a task in the browser, capturing each distinct page state')
    .argument('<task...>', 'Natural language task, e.g. "create a project in Linear"')
    .option('--plan <file>', 'Run a JSON/YAML action list instead of planning')
    .option('--config <path>', 'Path to config file', OUTPUT.CONFIG_FILE)
    .option('--output <dir>', 'Dataset root directory (overrides outputDir)')
    .option('--headless', 'Run browser headless')
    .option('--json', 'Output the run JSON to stdout')
    .action(async (words: string[], opts: CaptureOptions) => {
      const task = words.join(' ').trim();
      try {
        process.exitCode = await runCapture(task, opts);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error(message);
        process.exitCode = exitCodeOf(err);
      }
    });
}

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Print the action plan for a task as JSON without running it')
    .argument('<task...>', 'Natural language task')
    .option('--config <path>', 'Path to config file', OUTPUT.CONFIG_FILE)
    .action(async (words: string[], opts: PlanOptions) => {
      const task = words.join(' ').trim();
      try {
        const config = await loadConfig(opts.config);
        const actions = await resolvePlan(task, config, undefined);
        process.stdout.write(JSON.stringify({ actions }, null, 2) + '\n');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error(message);
        process.exitCode = exitCodeOf(err);
      }
    });
}
