/**
 * @fileoverview EXPLAIN request builder
 *
 * Pure and deterministic: the produced text is hashed and compared across
 * history, so part order and spacing must never change for the same input.
 *
 * Layout: `EXPLAIN [KIND] [settings] <query> [SETTINGS <request settings>]`
 */

import type {
  ExplainRequestOptions,
  ExplainSettingName,
  ExplainSettings,
  ExplainType,
} from './types.js';

/**
 * Per-kind setting names in emission order. `header` applies to every kind
 * and is always emitted first.
 */
const KIND_SETTINGS: Readonly<Record<ExplainType, readonly ExplainSettingName[]>> = {
  '': [],
  AST: [],
  SYNTAX: ['oneline', 'run_query_tree_passes', 'query_tree_passes'],
  'QUERY TREE': ['run_passes', 'dump_passes', 'passes', 'dump_tree', 'dump_ast'],
  PLAN: ['description', 'indexes', 'projections', 'actions', 'json'],
  PIPELINE: ['graph', 'compact'],
  ESTIMATE: [],
  'TABLE OVERRIDE': [],
};

/**
 * Settings that apply to a kind, in emission order
 */
export function applicableSettings(type: ExplainType): ExplainSettingName[] {
  return ['header', ...KIND_SETTINGS[type]];
}

/**
 * Render the kind-scoped settings clause; settings that are unset or that do
 * not apply to the kind are skipped
 */
export function buildSettingsClause(type: ExplainType, settings: ExplainSettings): string {
  const rendered: string[] = [];
  for (const name of applicableSettings(type)) {
    const value = settings[name];
    if (value !== undefined) {
      rendered.push(`${name}=${value}`);
    }
  }
  return rendered.join(', ');
}

/**
 * Milliseconds as seconds with exactly three decimals (1500 -> "1.500").
 * Integer arithmetic keeps the digits exact.
 */
export function formatSeconds(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const millis = ms % 1000;
  return `${seconds}.${String(millis).padStart(3, '0')}`;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function buildRequestSettings(type: ExplainType, options: ExplainRequestOptions): string[] {
  const settings: string[] = [];
  if (options.logComment) {
    settings.push(`log_comment=${quoteLiteral(options.logComment)}`);
  }
  if (options.forceAnalyzer && type === 'QUERY TREE') {
    settings.push('enable_analyzer=1');
  }
  const budget = options.maxExecutionTimeMs;
  if (budget !== undefined && Number.isSafeInteger(budget) && budget > 0) {
    settings.push(`max_execution_time=${formatSeconds(budget)}`);
  }
  return settings;
}

/**
 * Build the exact diagnostic request text.
 *
 * The query is appended verbatim, so an empty query leaves a trailing space
 * (`"EXPLAIN PLAN "`).
 */
export function buildExplainQuery(
  type: ExplainType,
  settings: ExplainSettings,
  query: string,
  options: ExplainRequestOptions = {}
): string {
  const parts: string[] = [type === '' ? 'EXPLAIN' : `EXPLAIN ${type}`];

  const settingsClause = buildSettingsClause(type, settings);
  if (settingsClause) {
    parts.push(settingsClause);
  }

  parts.push(query);

  const requestSettings = buildRequestSettings(type, options);
  if (requestSettings.length > 0) {
    parts.push('SETTINGS', requestSettings.join(', '));
  }

  return parts.join(' ');
}
