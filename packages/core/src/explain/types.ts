/**
 * @fileoverview Diagnostic (EXPLAIN) request and result types
 */

/**
 * Diagnostic kinds; the empty string is the engine's default kind and
 * renders as a bare `EXPLAIN`
 */
export type ExplainType =
  | ''
  | 'AST'
  | 'SYNTAX'
  | 'QUERY TREE'
  | 'PLAN'
  | 'PIPELINE'
  | 'ESTIMATE'
  | 'TABLE OVERRIDE';

export const EXPLAIN_TYPES = [
  '',
  'AST',
  'SYNTAX',
  'QUERY TREE',
  'PLAN',
  'PIPELINE',
  'ESTIMATE',
  'TABLE OVERRIDE',
] as const satisfies readonly ExplainType[];

export type ExplainSettingName =
  | 'header'
  | 'description'
  | 'indexes'
  | 'projections'
  | 'actions'
  | 'json'
  | 'graph'
  | 'compact'
  | 'oneline'
  | 'run_query_tree_passes'
  | 'query_tree_passes'
  | 'run_passes'
  | 'dump_passes'
  | 'passes'
  | 'dump_tree'
  | 'dump_ast';

/**
 * Integer-valued per-kind settings. Unset means omitted from the request.
 */
export type ExplainSettings = Partial<Record<ExplainSettingName, number>>;

export interface ExplainConfig {
  type: ExplainType;
  settings: ExplainSettings;
  enabled: boolean;
}

/**
 * One row of an ESTIMATE diagnostic
 */
export interface EstimateRow {
  database: string;
  table: string;
  parts: number;
  rows: number;
  marks: number;
}

/**
 * Result of one diagnostic. On failure `error` is set and `output` is empty;
 * ESTIMATE results carry `estimate` instead of text output.
 */
export interface ExplainResult {
  type: ExplainType;
  output: string;
  estimate?: EstimateRow[];
  error?: string;
}

/**
 * Request-level options appended after the query text
 */
export interface ExplainRequestOptions {
  /** Tracing tag rendered as `log_comment` */
  logComment?: string;
  /** Adds `enable_analyzer=1` to QUERY TREE requests */
  forceAnalyzer?: boolean;
  /** Advisory time budget; rendered only when a positive integer */
  maxExecutionTimeMs?: number;
}
