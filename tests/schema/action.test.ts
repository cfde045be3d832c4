import { describe, it, expect } from 'vitest';

import { parseAction, rawActionListSchema, stepLabel } from '../../src/schema/index.js';

describe('parseAction', () => {
  it('should normalise the type before validating', () => {
    const parsed = parseAction({ type: ' GOTO ', url: 'https://app.example.com' });

    expect(parsed).toEqual({
      ok: true,
      action: { type: 'goto', url: 'https://app.example.com' },
    });
  });

  it('should reject an unknown type with its name', () => {
    expect(parseAction({ type: 'hover', text: 'Menu' })).toEqual({
      ok: false,
      type: 'hover',
      error: 'Unknown action type: hover',
    });
  });

  it('should name the offending field of a malformed action', () => {
    expect(parseAction({ type: 'goto' })).toEqual({
      ok: false,
      type: 'goto',
      error: 'Invalid goto action (url): Required',
    });
  });

  it('should coerce fill values to strings', () => {
    const parsed = parseAction({ type: 'fill_inputs', inputs: { count: 3 } });

    expect(parsed).toEqual({
      ok: true,
      action: { type: 'fill_inputs', inputs: { count: '3' } },
    });
  });

  it('should keep explicit submit candidates', () => {
    const parsed = parseAction({ type: 'click_submit', buttons: ['Publish'] });

    expect(parsed).toEqual({
      ok: true,
      action: { type: 'click_submit', buttons: ['Publish'] },
    });
  });
});

describe('parseAction with a malformed type', () => {
  it('should reject an entry without a type', () => {
    expect(parseAction({ text: 'New' })).toEqual({
      ok: false,
      type: 'unknown',
      error: 'Unknown action type: (missing)',
    });
  });

  it('should reject a non-string type as unknown', () => {
    expect(parseAction({ type: 7 })).toEqual({
      ok: false,
      type: '7',
      error: 'Unknown action type: 7',
    });
  });
});

describe('rawActionListSchema', () => {
  it('should accept unknown types so the engine can report them', () => {
    const result = rawActionListSchema.safeParse([{ type: 'hover' }]);
    expect(result.success).toBe(true);
  });

  it('should accept entries without a string type', () => {
    const result = rawActionListSchema.safeParse([{ type: 'goto', url: 'https://a.example.com' }, { text: 'New' }, { type: 7 }]);
    expect(result.success).toBe(true);
  });

  it('should reject an empty plan', () => {
    expect(rawActionListSchema.safeParse([]).success).toBe(false);
  });
});

describe('stepLabel', () => {
  it('should turn underscores into dashes', () => {
    expect(stepLabel('click_submit')).toBe('click-submit');
  });

  it('should keep an unknown type inside the task directory', () => {
    expect(stepLabel('../Escape')).toBe('---escape');
  });
});
