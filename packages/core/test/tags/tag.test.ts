/**
 * @fileoverview Tests for tag parsing and classification
 */

import { describe, it, expect } from 'vitest';
import {
  formatTag,
  isStarred,
  isSystemTag,
  normalizeTag,
  parseTag,
  STARRED_TAG_KEY,
} from '../../src/tags/tag.js';

describe('parseTag', () => {
  it('should parse a bare key with an empty value', () => {
    expect(parseTag('production')).toEqual({ key: 'production', value: '' });
  });

  it('should split on the first equals sign only', () => {
    expect(parseTag('expr=a=b')).toEqual({ key: 'expr', value: 'a=b' });
  });

  it('should trim both sides', () => {
    expect(parseTag('  env =  prod ')).toEqual({ key: 'env', value: 'prod' });
  });

  it('should accept degenerate input', () => {
    expect(parseTag('')).toEqual({ key: '', value: '' });
    expect(parseTag('=x')).toEqual({ key: '', value: 'x' });
    expect(parseTag('key=')).toEqual({ key: 'key', value: '' });
  });
});

describe('formatTag', () => {
  it('should omit the separator for an empty value', () => {
    expect(formatTag('production', '')).toBe('production');
    expect(formatTag('env', 'prod')).toBe('env=prod');
  });
});

describe('normalizeTag', () => {
  it('should be idempotent', () => {
    const inputs = ['a', ' a = b ', 'k=v=w', '=', '', 'key=', '  spaced key  ', 'system:starred'];
    for (const input of inputs) {
      const once = normalizeTag(input);
      expect(normalizeTag(once)).toBe(once);
    }
  });

  it('should collapse an empty value to the bare key', () => {
    expect(normalizeTag('key = ')).toBe('key');
  });
});

describe('isSystemTag', () => {
  it('should match the reserved prefix including its separator', () => {
    expect(isSystemTag('system:starred')).toBe(true);
    expect(isSystemTag('production')).toBe(false);
    expect(isSystemTag('system')).toBe(false);
  });
});

describe('isStarred', () => {
  it('should detect the starred key among tags', () => {
    expect(isStarred([{ tagKey: 'env' }, { tagKey: STARRED_TAG_KEY }])).toBe(true);
    expect(isStarred([{ tagKey: 'env' }])).toBe(false);
    expect(isStarred([])).toBe(false);
  });
});
