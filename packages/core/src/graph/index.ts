/**
 * @fileoverview Version graph exports
 */

export * from './types.js';
export { hashQuery, buildLogComment } from './hash.js';
export { statValueSchema, executionStatsSchema } from './schemas.js';
export { VersionGraph, MAIN_BRANCH_NAME } from './version-graph.js';
export {
  decideReuse,
  checkReuse,
  type ReuseDecision,
  type ExecuteReason,
} from './result-reuse.js';
export {
  AutoBranchPolicy,
  autoBranchName,
  type AutoBranchDecision,
  type AutoBranchPolicyOptions,
} from './auto-branch.js';
