import type { ButtonInfo, InputField, NavigationLink, PageSummary } from '../schema/index.js';
import type { MatcherWeights } from '../schema/config.js';

// ── Vocabulary ───────────────────────────────────────────────

/** Action-intent clusters: any hit in the task enables the whole cluster. */
export const ACTION_CLUSTERS: readonly (readonly string[])[] = [
  ['create', 'new', 'add'],
  ['save', 'update', 'edit'],
  ['submit', 'confirm', 'send'],
  ['delete', 'remove'],
  ['cancel', 'close'],
];

export const OBJECT_NOUNS = [
  'project',
  'issue',
  'task',
  'page',
  'item',
  'note',
  'card',
  'document',
] as const;

export const NAVIGATION_CATEGORIES = [
  'project',
  'issue',
  'task',
  'page',
  'document',
  'database',
  'team',
  'settings',
] as const;

// ── Task intent ──────────────────────────────────────────────

export interface TaskIntent {
  actionKeywords: string[];
  objectKeywords: string[];
  wantsCreate: boolean;
}

export function extractIntent(task: string): TaskIntent {
  const lower = task.toLowerCase();

  const actionKeywords = ACTION_CLUSTERS
    .filter((cluster) => cluster.some((kw) => lower.includes(kw)))
    .flat();

  const objectKeywords = OBJECT_NOUNS.filter((obj) => lower.includes(obj));

  return {
    actionKeywords,
    objectKeywords,
    wantsCreate: lower.includes('create'),
  };
}

// ── Button scoring ───────────────────────────────────────────

export function scoreButton(
  button: ButtonInfo,
  intent: TaskIntent,
  weights: MatcherWeights,
): number {
  const text = button.text.toLowerCase();
  const hasAction = intent.actionKeywords.some((kw) => text.includes(kw));
  const hasObject = intent.objectKeywords.some((obj) => text.includes(obj));
  const saysCreate = text.includes('create');
  const saysAdd = text.includes('add');

  let score = 0;
  if (hasAction) score += weights.actionKeyword;
  if (hasObject) score += weights.objectKeyword;
  if (hasAction && hasObject) score += weights.actionObjectCombo;
  if (button.inModal) score += weights.inModal;
  if (intent.wantsCreate && saysCreate && !saysAdd) score += weights.createPreference;
  if (intent.wantsCreate && saysAdd && !saysCreate) score -= weights.addPenalty;

  return score;
}

export interface ButtonMatch {
  button: ButtonInfo;
  score: number;
}

/**
 * Best-scoring button for the task, or null when nothing scores above
 * zero. While a modal is open and holds buttons, only those compete.
 * Ties keep the earlier button in scan order.
 */
export function matchButton(
  summary: Pick<PageSummary, 'buttons' | 'hasModal'>,
  task: string,
  weights: MatcherWeights,
): ButtonMatch | null {
  const modalButtons = summary.hasModal
    ? summary.buttons.filter((b) => b.inModal)
    : [];
  const candidates = modalButtons.length > 0 ? modalButtons : summary.buttons;

  const intent = extractIntent(task);
  let best: ButtonMatch | null = null;

  for (const button of candidates) {
    const score = scoreButton(button, intent, weights);
    if (score <= 0) continue;
    if (best === null || score > best.score) {
      best = { button, score };
    }
  }

  return best;
}

// ── Navigation ───────────────────────────────────────────────

/** First navigation link naming a category the task mentions. */
export function matchNavigation(
  links: readonly NavigationLink[],
  task: string,
): NavigationLink | null {
  const lower = task.toLowerCase();
  const categories = NAVIGATION_CATEGORIES.filter((cat) => lower.includes(cat));
  if (categories.length === 0) return null;

  return (
    links.find((link) => {
      const text = link.text.toLowerCase();
      return categories.some((cat) => text.includes(cat));
    }) ?? null
  );
}

// ── Inputs ───────────────────────────────────────────────────

const PLAIN_TEXT_TYPES = new Set(['text', 'search', '']);

/**
 * Input for a free-form field name: exact name/placeholder/label match
 * first, then substring, then the first plain text-type input.
 */
export function matchInput(
  inputs: readonly InputField[],
  fieldName: string,
): InputField | null {
  const field = fieldName.trim().toLowerCase();
  if (!field) return null;

  const keys = (inp: InputField): string[] =>
    [inp.name, inp.placeholder, inp.label].map((s) => s.toLowerCase());

  const exact = inputs.find((inp) => keys(inp).some((k) => k === field));
  if (exact) return exact;

  const partial = inputs.find((inp) => keys(inp).some((k) => k.includes(field)));
  if (partial) return partial;

  return inputs.find((inp) => PLAIN_TEXT_TYPES.has(inp.type.toLowerCase())) ?? null;
}
