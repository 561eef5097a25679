/**
 * @fileoverview Tests for default explain configs and filtering
 */

import { describe, it, expect } from 'vitest';
import {
  filterExplainConfigs,
  getDefaultExplainConfigs,
  resolveExplainConfigs,
} from '../../src/explain/configs.js';
import type { ExplainConfig } from '../../src/explain/types.js';

describe('getDefaultExplainConfigs', () => {
  it('should return the six default diagnostics in order', () => {
    expect(getDefaultExplainConfigs().map(c => c.type)).toEqual([
      'PLAN',
      'PIPELINE',
      'ESTIMATE',
      'AST',
      'SYNTAX',
      'QUERY TREE',
    ]);
  });

  it('should return a fresh copy each call', () => {
    const [first] = getDefaultExplainConfigs();
    first.enabled = false;
    expect(getDefaultExplainConfigs()[0].enabled).toBe(true);
  });
});

describe('resolveExplainConfigs', () => {
  it('should fall back to defaults for missing or empty input', () => {
    expect(resolveExplainConfigs(undefined)).toHaveLength(6);
    expect(resolveExplainConfigs(null)).toHaveLength(6);
    expect(resolveExplainConfigs([])).toHaveLength(6);
  });

  it('should keep explicit configs', () => {
    const configs: ExplainConfig[] = [{ type: 'AST', settings: {}, enabled: true }];
    expect(resolveExplainConfigs(configs)).toBe(configs);
  });
});

describe('filterExplainConfigs', () => {
  const configs = getDefaultExplainConfigs();

  it('should drop QUERY TREE when the analyzer is off', () => {
    const filtered = filterExplainConfigs(configs, { enable_analyzer: '0' }, false);
    expect(filtered.map(c => c.type)).not.toContain('QUERY TREE');
    expect(filtered).toHaveLength(5);
  });

  it('should keep QUERY TREE when forced', () => {
    expect(filterExplainConfigs(configs, { enable_analyzer: '0' }, true)).toHaveLength(6);
  });

  it('should keep everything when the analyzer is on or unknown', () => {
    expect(filterExplainConfigs(configs, { enable_analyzer: '1' }, false)).toHaveLength(6);
    expect(filterExplainConfigs(configs, undefined, false)).toHaveLength(6);
    expect(filterExplainConfigs(configs, {}, false)).toHaveLength(6);
  });
});
