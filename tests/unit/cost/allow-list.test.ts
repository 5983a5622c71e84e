import { describe, it, expect } from 'vitest';
import { FALLBACK_ALLOWED_MODELS, buildAllowList, isModelAllowed } from '../../../src/cost/allow-list.js';

describe('buildAllowList', () => {
  it('uses a configured list as given', () => {
    expect(buildAllowList(['gpt-4o'], ['o3', 'gpt-4.1'])).toEqual(['o3', 'gpt-4.1']);
  });

  it('derives sorted prefixes from catalog keys, dropping covered keys', () => {
    const keys = ['gpt-4o-mini', 'o3', 'gpt-4o', 'gpt-4o-2024-08-06', 'o3-mini'];
    expect(buildAllowList(keys)).toEqual(['gpt-4o', 'o3']);
  });

  it('falls back to the built-in list for an empty catalog', () => {
    expect(buildAllowList([])).toEqual([...FALLBACK_ALLOWED_MODELS]);
  });

  it('ignores an empty configured list', () => {
    expect(buildAllowList(['o3'], [])).toEqual(['o3']);
  });
});

describe('isModelAllowed', () => {
  const allowList = ['gpt-4o', 'o3'];

  it('accepts models starting with a listed prefix', () => {
    expect(isModelAllowed('gpt-4o-mini', allowList)).toBe(true);
    expect(isModelAllowed('o3', allowList)).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isModelAllowed('claude-3', allowList)).toBe(false);
    expect(isModelAllowed('gpt-4', allowList)).toBe(false);
  });
});
