import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import type { LLMClient } from '../llm/index.js';
import type { RawAction } from '../schema/index.js';
import { rawActionListSchema, rawActionType } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Error ────────────────────────────────────────────────────

export class PlannerError extends Error {
  readonly exitCode = 3;

  constructor(message: string) {
    super(message);
    this.name = 'PlannerError';
  }
}

// ── Public types ─────────────────────────────────────────────

export type PlanSource = 'llm' | 'heuristic';

export interface Plan {
  actions: RawAction[];
  source: PlanSource;
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Main entry ───────────────────────────────────────────────

/**
 * Plan with the LLM when one is configured, falling back to the
 * heuristic planner when there is none or it fails.
 */
export async function plan(task: string, client: LLMClient | null): Promise<Plan> {
  if (client) {
    try {
      return { actions: await planActions(client, task), source: 'llm' };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`LLM planning failed, using heuristics: ${message}`);
    }
  }

  const actions = planWithHeuristics(task);
  log.planned(actions.length, 'heuristic');
  logPlannedActions(actions);
  return { actions, source: 'heuristic' };
}

export async function planActions(client: LLMClient, task: string): Promise<RawAction[]> {
  log.llm('Planner generating actions...');
  const systemPrompt = await readTemplate('planner.txt');
  const userPrompt = `Task: ${task}`;

  const raw = await client.generate(systemPrompt, userPrompt);
  const firstAttempt = parsePlan(raw);
  if (firstAttempt.ok) {
    log.planned(firstAttempt.actions.length, 'llm');
    logPlannedActions(firstAttempt.actions);
    return firstAttempt.actions;
  }

  // Repair: one retry with the repair prompt
  log.warn(`Planner parse failed, attempting repair: ${firstAttempt.error}`);
  const repairPrompt = renderRepairPrompt(await readTemplate('planner_repair.txt'), raw, firstAttempt.error);
  const repaired = await client.generate(systemPrompt, `${userPrompt}\n\n${repairPrompt}`);

  const secondAttempt = parsePlan(repaired);
  if (secondAttempt.ok) {
    log.planned(secondAttempt.actions.length, 'llm');
    logPlannedActions(secondAttempt.actions);
    return secondAttempt.actions;
  }

  throw new PlannerError(
    `Planner failed after repair attempt: ${secondAttempt.error}`,
  );
}

function logPlannedActions(actions: readonly RawAction[]): void {
  actions.forEach((action, i) => {
    log.detail(`${String(i + 1)}. ${JSON.stringify(action)}`);
  });
}

// ── Template rendering ───────────────────────────────────────

async function readTemplate(name: string): Promise<string> {
  return readFile(path.join(PROMPTS_DIR, name), 'utf-8');
}

function renderRepairPrompt(template: string, previousOutput: string, error: string): string {
  return template
    .replace('{{error}}', error)
    .replace('{{previousOutput}}', previousOutput);
}

// ── JSON extraction + validation ─────────────────────────────

type ParseResult =
  | { ok: true; actions: RawAction[] }
  | { ok: false; error: string };

// Models wrap the list under any of these keys.
const wrappedPlanSchema = z.union([
  z.object({ actions: z.array(z.unknown()) }).transform((v) => v.actions),
  z.object({ plan: z.array(z.unknown()) }).transform((v) => v.plan),
  z.object({ steps: z.array(z.unknown()) }).transform((v) => v.steps),
]);

/** Extract, unwrap and validate an action list from model output. */
export function parsePlan(raw: string): ParseResult {
  const extracted = extractJSON(raw);
  if (!extracted.ok) return extracted;

  const wrapped = wrappedPlanSchema.safeParse(extracted.value);
  const list: unknown = wrapped.success ? wrapped.data : extracted.value;

  const result = rawActionListSchema.safeParse(list);
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }

  const actions = result.data;

  if (actions.length > LIMITS.MAX_PLANNED_ACTIONS) {
    return {
      ok: false,
      error: `Too many actions: ${String(actions.length)} (max ${String(LIMITS.MAX_PLANNED_ACTIONS)})`,
    };
  }

  const first = actions[0];
  if (!first || rawActionType(first) !== 'goto') {
    return { ok: false, error: 'First action must be a "goto" action' };
  }

  return { ok: true, actions };
}

type ExtractResult = { ok: true; value: unknown } | { ok: false; error: string };

/**
 * Pull a JSON value out of model output: the whole text, a fenced
 * block, the outermost object, then the outermost array.
 */
export function extractJSON(raw: string): ExtractResult {
  let lastError = 'empty output';
  for (const candidate of jsonCandidates(raw)) {
    try {
      const value: unknown = JSON.parse(candidate);
      return { ok: true, value };
    } catch (e) {
      lastError = e instanceof Error ? e.message : String(e);
    }
  }
  return { ok: false, error: `Invalid JSON: ${lastError}` };
}

function jsonCandidates(raw: string): string[] {
  const candidates: string[] = [];
  const trimmed = raw.trim();
  if (trimmed) candidates.push(trimmed);

  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) candidates.push(fenced[1].trim());

  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const start = raw.indexOf(open);
    const end = raw.lastIndexOf(close);
    if (start !== -1 && end > start) candidates.push(raw.slice(start, end + 1));
  }

  return candidates;
}

// ── Heuristic planner ────────────────────────────────────────

const URL_PATTERN = /\bhttps?:\/\/[^\s"'<>]+/i;
const DOMAIN_PATTERN = /\b(?:[a-z0-9-]+\.)+(?:com|org|net|io|app|dev|so|co|ai)\b(?:\/[^\s"'<>]*)?/i;
const GOOGLE_URL = 'https://www.google.com';

const SECTIONS = new Set(['projects', 'issues', 'tasks', 'pages', 'documents']);
// Objects whose create form leads with a title rather than a name.
const TITLED_OBJECTS = new Set(['issue', 'task', 'page', 'document', 'post', 'ticket']);

const CREATE_PATTERN = /\b(?:create|add|make)\b\s+(?:(?:a|an|the|new|another)\s+)*([a-z][\w-]*)/i;
const NAME_PATTERN = /\b(?:called|named|titled)\s+["']?(.+?)["']?(?=\s+(?:in|on|at)\b|[.!?]?$)/i;

/**
 * Rule-based plan for when no LLM is available: a search flow, a
 * create-object flow, or navigate and capture.
 */
export function planWithHeuristics(task: string): RawAction[] {
  const url = startUrl(task);
  if (!url) {
    throw new PlannerError(`Could not infer a start URL from the task: "${task}"`);
  }

  const goto: RawAction = { type: 'goto', url };

  const query = searchQuery(task);
  if (query) {
    return [
      goto,
      { type: 'capture_state' },
      { type: 'fill_inputs', inputs: { q: query } },
      { type: 'click_submit' },
      { type: 'capture_state' },
    ];
  }

  const create = CREATE_PATTERN.exec(task);
  const object = create?.[1]?.toLowerCase();
  if (object) {
    const section = `${object}s`;
    const field = TITLED_OBJECTS.has(object) ? 'title' : 'name';
    const name = NAME_PATTERN.exec(task)?.[1]?.trim() || `New ${capitalize(object)}`;
    return [
      goto,
      ...(SECTIONS.has(section) ? [{ type: 'click_by_text', text: capitalize(section) }] : []),
      { type: 'click_by_text', text: 'Create' },
      { type: 'wait_for_modal' },
      { type: 'fill_inputs', inputs: { [field]: name } },
      { type: 'click_submit' },
      { type: 'capture_state' },
    ];
  }

  const section = task
    .toLowerCase()
    .split(/[^a-z]+/)
    .find((word) => SECTIONS.has(word));
  return [
    goto,
    ...(section ? [{ type: 'click_by_text', text: capitalize(section) }] : []),
    { type: 'capture_state' },
  ];
}

function startUrl(task: string): string | null {
  const explicit = URL_PATTERN.exec(task)?.[0];
  if (explicit) return trimPunctuation(explicit);

  const domain = DOMAIN_PATTERN.exec(task)?.[0];
  if (domain) return `https://${trimPunctuation(domain)}`;

  if (/\bgoogle\b/i.test(task)) return GOOGLE_URL;
  return null;
}

/** The text after "search" (or its last "for"), without site mentions. */
function searchQuery(task: string): string | null {
  const afterSearch = /\bsearch\b(.*)$/i.exec(task)?.[1];
  if (afterSearch === undefined) return null;

  const afterFor = /.*\bfor\s+(.+)$/i.exec(afterSearch)?.[1];
  const query = (afterFor ?? afterSearch)
    .replace(new RegExp(URL_PATTERN.source, 'gi'), ' ')
    .replace(new RegExp(DOMAIN_PATTERN.source, 'gi'), ' ')
    .replace(/\bgoogle\b/gi, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/(?:^|\s+)(?:on|in|at|using|via)$/i, '')
    .replace(/["']/g, '')
    .replace(/[.,;:!?]+$/, '')
    .trim();

  return query.length >= 2 ? query : null;
}

function trimPunctuation(text: string): string {
  return text.replace(/[.,;:!?)]+$/, '');
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

// ── Plan files ───────────────────────────────────────────────

/**
 * Read a hand-written plan: a JSON or YAML list of actions, bare or
 * wrapped like model output. Throws when the file does not hold one.
 */
export async function loadPlanFile(filePath: string): Promise<RawAction[]> {
  const raw = await readFile(filePath, 'utf-8');
  const parsed: unknown = filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);

  const wrapped = wrappedPlanSchema.safeParse(parsed);
  return rawActionListSchema.parse(wrapped.success ? wrapped.data : parsed);
}
