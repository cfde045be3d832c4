import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ActionResult, CapturedState, RunReport } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(report: RunReport, exitCode: number): JsonOutput {
  const succeeded = report.results.filter((r) => r.success).length;

  const output: JsonOutput = {
    version: JSON_OUTPUT_VERSION,
    runId: report.runId,
    task: report.task,
    taskSlug: report.taskSlug,
    taskDir: report.capture.taskDir,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    durationMs: report.durationMs,
    exitCode,
    aborted: report.aborted,
    actions: {
      total: report.results.length,
      succeeded,
      failed: report.results.length - succeeded,
    },
    results: report.results,
    states: report.capture.states,
  };
  if (report.abortReason !== undefined) output.abortReason = report.abortReason;
  return output;
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(report: RunReport): string {
  const lines: string[] = [];
  const { capture } = report;

  // Header + metadata
  lines.push(`# flowshot Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Task** | ${escapeMarkdownCell(report.task)} |`);
  lines.push(`| **Run ID** | \`${report.runId}\` |`);
  lines.push(`| **Started** | ${report.startedAt} |`);
  lines.push(`| **Finished** | ${report.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(report.durationMs)} |`);
  lines.push(`| **States** | ${String(capture.totalStates)} |`);
  if (report.aborted) {
    lines.push(`| **Aborted** | ${escapeMarkdownCell(report.abortReason ?? 'yes')} |`);
  }
  lines.push('');

  // Action table
  lines.push(`## Actions`);
  lines.push('');
  lines.push(`| # | Action | Result | Method | Detail |`);
  lines.push(`|---|--------|--------|--------|--------|`);

  report.results.forEach((result, i) => {
    lines.push(
      `| ${String(i + 1)} | ${result.action} | ${result.success ? '[OK]' : '[FAIL]'} | ${methodOf(result)} | ${escapeMarkdownCell(detailOf(result))} |`,
    );
  });
  lines.push('');

  // Captured states
  lines.push(`## Captured States`);
  lines.push('');

  if (capture.states.length === 0) {
    lines.push('_No states captured._');
    lines.push('');
  }
  for (const state of capture.states) {
    lines.push(...stateSection(state));
  }

  return lines.join('\n');
}

// ── Writer ───────────────────────────────────────────────────

export interface WrittenReport {
  jsonPath: string;
  markdownPath: string;
}

/** Write `run.json` and `report.md` into the task directory. */
export async function writeReports(report: RunReport, exitCode: number): Promise<WrittenReport> {
  const dir = report.capture.taskDir;
  const jsonPath = path.join(dir, 'run.json');
  const markdownPath = path.join(dir, 'report.md');

  await writeFile(jsonPath, serializeJSON(generateJSON(report, exitCode)) + '\n', 'utf-8');
  await writeFile(markdownPath, generateMarkdown(report), 'utf-8');

  return { jsonPath, markdownPath };
}

// ── Helpers ──────────────────────────────────────────────────

function stateSection(state: CapturedState): string[] {
  return [
    `### ${String(state.index)}. ${state.step}`,
    '',
    `- URL: ${state.url}`,
    `- Captured: ${state.timestamp}`,
    `- Hash: \`${state.dom_hash.slice(0, 16)}\``,
    '',
    `![${state.step}](${state.screenshot})`,
    '',
  ];
}

function methodOf(result: ActionResult): string {
  return 'method' in result && result.method ? result.method : '';
}

function detailOf(result: ActionResult): string {
  if (!result.success) return result.error ?? '';
  if ('filled' in result) return Object.keys(result.filled).join(', ');
  if ('button' in result && result.button) return result.button;
  if ('text' in result && result.text) return result.text;
  if ('selector' in result && result.selector) return result.selector;
  if ('title' in result && result.title) return result.title;
  if ('url' in result && result.url) return result.url;
  return '';
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
