import { describe, it, expect } from 'vitest';

import { padIndex, slugify } from '../../src/utils/slug.js';

describe('slugify', () => {
  it('should produce a folder-safe slug', () => {
    expect(slugify('Create a project in Linear!')).toBe('create-a-project-in-linear');
  });

  it('should collapse runs of separators and trim them', () => {
    expect(slugify('  --Search   "vitest" -- docs ')).toBe('search-vitest-docs');
  });
});

describe('padIndex', () => {
  it('should pad to three digits', () => {
    expect(padIndex(7)).toBe('007');
    expect(padIndex(123)).toBe('123');
  });
});
