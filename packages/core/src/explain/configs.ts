/**
 * @fileoverview Default diagnostic set and config filtering
 */

import type { ExplainConfig } from './types.js';

/**
 * The diagnostics run when a request names none. Returns a fresh copy on
 * every call so callers may mutate it.
 */
export function getDefaultExplainConfigs(): ExplainConfig[] {
  return [
    { type: 'PLAN', settings: { indexes: 1, description: 1, json: 1 }, enabled: true },
    { type: 'PIPELINE', settings: { compact: 1 }, enabled: true },
    { type: 'ESTIMATE', settings: {}, enabled: true },
    { type: 'AST', settings: {}, enabled: true },
    { type: 'SYNTAX', settings: { oneline: 0 }, enabled: true },
    { type: 'QUERY TREE', settings: { run_passes: 1, dump_tree: 1 }, enabled: true },
  ];
}

/**
 * The given configs, or the defaults when none are given
 */
export function resolveExplainConfigs(configs?: ExplainConfig[] | null): ExplainConfig[] {
  if (!configs || configs.length === 0) {
    return getDefaultExplainConfigs();
  }
  return configs;
}

/**
 * Drop QUERY TREE diagnostics when the server runs with the analyzer off
 * and the request does not force it on
 */
export function filterExplainConfigs(
  configs: ExplainConfig[],
  serverSettings: Readonly<Record<string, string>> | undefined,
  forceAnalyzer: boolean
): ExplainConfig[] {
  if (forceAnalyzer || serverSettings?.enable_analyzer !== '0') {
    return configs;
  }
  return configs.filter(config => config.type !== 'QUERY TREE');
}
