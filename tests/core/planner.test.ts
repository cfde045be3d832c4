import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect } from 'vitest';

import {
  PlannerError,
  extractJSON,
  loadPlanFile,
  parsePlan,
  plan,
  planActions,
  planWithHeuristics,
} from '../../src/core/planner.js';
import { createMockClient } from '../../src/llm/index.js';
import type { LLMClient } from '../../src/llm/index.js';

const TASK = 'create a project in the tracker';
const VALID_PLAN = '{"actions":[{"type":"goto","url":"https://tracker.example.com"},{"type":"capture_state"}]}';

describe('extractJSON', () => {
  it('should read a fenced block', () => {
    expect(extractJSON('Here you go:\n```json\n[1, 2]\n```')).toEqual({ ok: true, value: [1, 2] });
  });

  it('should read the outermost object inside prose', () => {
    expect(extractJSON('Plan: {"actions": []} Done.')).toEqual({ ok: true, value: { actions: [] } });
  });

  it('should fail on text without JSON', () => {
    const result = extractJSON('no plan today');
    expect(result.ok).toBe(false);
  });
});

describe('parsePlan', () => {
  it('should unwrap a steps list', () => {
    const result = parsePlan('{"steps":[{"type":"goto","url":"https://a.example.com"}]}');
    expect(result).toEqual({ ok: true, actions: [{ type: 'goto', url: 'https://a.example.com' }] });
  });

  it('should require a leading goto', () => {
    expect(parsePlan('[{"type":"click_by_text","text":"New"}]')).toEqual({
      ok: false,
      error: 'First action must be a "goto" action',
    });
  });

  it('should cap the number of actions', () => {
    const actions = [{ type: 'goto', url: 'https://a.example.com' }, ...Array.from({ length: 30 }, () => ({ type: 'capture_state' }))];
    expect(parsePlan(JSON.stringify(actions))).toEqual({ ok: false, error: 'Too many actions: 31 (max 30)' });
  });
});

describe('planActions', () => {
  it('should accept a fenced plan on the first attempt', async () => {
    const client = createMockClient([`Sure:\n\`\`\`json\n${VALID_PLAN}\n\`\`\``]);
    const actions = await planActions(client, TASK);

    expect(actions).toEqual([{ type: 'goto', url: 'https://tracker.example.com' }, { type: 'capture_state' }]);
    expect(client.prompts).toEqual([`Task: ${TASK}`]);
  });

  it('should repair an unusable answer once', async () => {
    const client = createMockClient(['I will plan it.', VALID_PLAN]);
    const actions = await planActions(client, TASK);

    expect(actions).toHaveLength(2);
    expect(client.prompts).toHaveLength(2);
    expect(client.prompts[1]).toContain(`Task: ${TASK}\n\nYour previous answer could not be used`);
    expect(client.prompts[1]).toContain('Previous answer:\nI will plan it.');
  });

  it('should give up after the repair attempt', async () => {
    const client = createMockClient(['nope', '{"actions": []}']);
    await expect(planActions(client, TASK)).rejects.toThrow(PlannerError);
  });
});

describe('plan', () => {
  it('should plan heuristically without a client', async () => {
    const result = await plan('open https://tracker.example.com', null);
    expect(result).toEqual({
      source: 'heuristic',
      actions: [{ type: 'goto', url: 'https://tracker.example.com' }, { type: 'capture_state' }],
    });
  });

  it('should fall back to heuristics when the client fails', async () => {
    const failing: LLMClient = {
      generate: async () => {
        throw new Error('connection refused');
      },
    };
    const result = await plan('open https://tracker.example.com', failing);
    expect(result.source).toBe('heuristic');
  });

  it('should use the model plan when it parses', async () => {
    const result = await plan(TASK, createMockClient([VALID_PLAN]));
    expect(result.source).toBe('llm');
  });
});

describe('planWithHeuristics', () => {
  it('should plan a search flow', () => {
    expect(planWithHeuristics('search for typescript generics on google')).toEqual([
      { type: 'goto', url: 'https://www.google.com' },
      { type: 'capture_state' },
      { type: 'fill_inputs', inputs: { q: 'typescript generics' } },
      { type: 'click_submit' },
      { type: 'capture_state' },
    ]);
  });

  it('should plan a create flow with the given name', () => {
    expect(planWithHeuristics('create a project called Apollo in https://tracker.example.com')).toEqual([
      { type: 'goto', url: 'https://tracker.example.com' },
      { type: 'click_by_text', text: 'Projects' },
      { type: 'click_by_text', text: 'Create' },
      { type: 'wait_for_modal' },
      { type: 'fill_inputs', inputs: { name: 'Apollo' } },
      { type: 'click_submit' },
      { type: 'capture_state' },
    ]);
  });

  it('should title objects that take one and name them by default', () => {
    const actions = planWithHeuristics('add an issue on tracker.example.com');

    expect(actions[0]).toEqual({ type: 'goto', url: 'https://tracker.example.com' });
    expect(actions[1]).toEqual({ type: 'click_by_text', text: 'Issues' });
    expect(actions[4]).toEqual({ type: 'fill_inputs', inputs: { title: 'New Issue' } });
  });

  it('should navigate to a section and capture it', () => {
    expect(planWithHeuristics('open the projects list at https://tracker.example.com/home.')).toEqual([
      { type: 'goto', url: 'https://tracker.example.com/home' },
      { type: 'click_by_text', text: 'Projects' },
      { type: 'capture_state' },
    ]);
  });

  it('should refuse a task without a start URL', () => {
    expect(() => planWithHeuristics('do something useful')).toThrow(
      'Could not infer a start URL from the task: "do something useful"',
    );
  });
});

describe('loadPlanFile', () => {
  it('should read YAML and wrapped JSON plans', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'flowshot-plan-'));
    try {
      const yamlPath = path.join(dir, 'plan.yaml');
      await writeFile(yamlPath, '- type: goto\n  url: https://a.example.com\n- type: capture_state\n');
      const jsonPath = path.join(dir, 'plan.json');
      await writeFile(jsonPath, JSON.stringify({ actions: [{ type: 'goto', url: 'https://a.example.com' }] }));

      expect(await loadPlanFile(yamlPath)).toEqual([
        { type: 'goto', url: 'https://a.example.com' },
        { type: 'capture_state' },
      ]);
      expect(await loadPlanFile(jsonPath)).toHaveLength(1);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
