/**
 * @fileoverview Result reuse decision
 *
 * A parent version's diagnostics are reused only when the query text is
 * unchanged and every stored result succeeded. A hash match alone is not
 * enough: errored results are always re-executed.
 */

import type { QueryVersion, VersionId } from './types.js';

export type ExecuteReason =
  | 'no-parent'
  | 'parent-missing'
  | 'hash-mismatch'
  | 'no-results'
  | 'parent-errored';

export type ReuseDecision =
  | { decision: 'reuse'; version: QueryVersion }
  | { decision: 'execute'; reason: ExecuteReason };

/**
 * Pure decision over an already-loaded parent
 */
export function decideReuse(parent: QueryVersion | null, queryHash: string): ReuseDecision {
  if (!parent) {
    return { decision: 'execute', reason: 'parent-missing' };
  }
  if (parent.queryHash !== queryHash) {
    return { decision: 'execute', reason: 'hash-mismatch' };
  }
  if (parent.explainResults.length === 0) {
    return { decision: 'execute', reason: 'no-results' };
  }
  if (parent.explainResults.some(result => Boolean(result.error))) {
    return { decision: 'execute', reason: 'parent-errored' };
  }
  return { decision: 'reuse', version: parent };
}

/**
 * Look up the parent and decide. Read-only.
 */
export async function checkReuse(
  lookup: { getVersion(id: VersionId): Promise<QueryVersion | null> },
  parentVersionId: VersionId | null | undefined,
  queryHash: string
): Promise<ReuseDecision> {
  if (!parentVersionId) {
    return { decision: 'execute', reason: 'no-parent' };
  }
  return decideReuse(await lookup.getVersion(parentVersionId), queryHash);
}
