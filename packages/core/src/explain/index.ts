/**
 * @fileoverview Diagnostic (EXPLAIN) exports
 */

export * from './types.js';
export {
  buildExplainQuery,
  buildSettingsClause,
  applicableSettings,
  formatSeconds,
} from './query-builder.js';
export {
  getDefaultExplainConfigs,
  resolveExplainConfigs,
  filterExplainConfigs,
} from './configs.js';
export {
  explainTypeSchema,
  explainSettingsSchema,
  explainConfigSchema,
  explainResultSchema,
  explainResultsSchema,
  estimateRowSchema,
} from './schemas.js';
export { ExplainExecutor } from './executor.js';
