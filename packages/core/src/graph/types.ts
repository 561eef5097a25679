/**
 * @fileoverview Branch / version / tag entities
 *
 * Versions are immutable snapshots of one query text plus the diagnostics
 * captured for it. Branches are named lines of versions with a movable head
 * pointer. Tags label versions and are never required to exist.
 */

import type { ExplainResult } from '../explain/types.js';
import { generateId } from '../utils/ids.js';

// =============================================================================
// Branded Types for Type Safety
// =============================================================================

export type BranchId = string & { readonly __brand: 'BranchId' };

export type VersionId = string & { readonly __brand: 'VersionId' };

export type TagId = string & { readonly __brand: 'TagId' };

// Type constructors
export const BranchId = (id: string): BranchId => id as BranchId;
export const VersionId = (id: string): VersionId => id as VersionId;
export const TagId = (id: string): TagId => id as TagId;

export const newBranchId = (): BranchId => BranchId(generateId('br'));
export const newVersionId = (): VersionId => VersionId(generateId('qv'));
export const newTagId = (): TagId => TagId(generateId('tag'));

// =============================================================================
// Execution Statistics
// =============================================================================

/**
 * Closed value set for the free-form statistics bag, so it always
 * serializes to plain JSON
 */
export type StatValue = number | string | boolean | { [key: string]: StatValue };

export type ExecutionStats = Record<string, StatValue>;

// =============================================================================
// Entities
// =============================================================================

export interface Branch {
  id: BranchId;
  name: string;
  /** Branch this one was forked from; null for root branches */
  parentBranchId: BranchId | null;
  /** Version the fork was taken at */
  branchFromVersionId: VersionId | null;
  /** Head pointer; null until the first version is saved */
  currentVersionId: VersionId | null;
  createdAt: string;
}

export interface QueryVersion {
  id: VersionId;
  branchId: BranchId;
  query: string;
  /** Lowercase hex SHA-256 of `query` */
  queryHash: string;
  explainResults: ExplainResult[];
  executionStats: ExecutionStats;
  createdAt: string;
  /** Version this one was edited from; null for the first version of a branch */
  parentVersionId: VersionId | null;
}

export interface VersionTag {
  id: TagId;
  versionId: VersionId;
  tagKey: string;
  /** Empty string for simple (key-only) tags */
  tagValue: string;
  createdAt: string;
}

export interface VersionWithTags extends QueryVersion {
  tags: VersionTag[];
}
