/**
 * @fileoverview Persistence contract
 *
 * The graph, tag and explain layers own every invariant; a VersionStore only
 * stores and returns entities. The one multi-statement unit it must make
 * atomic is `saveVersion` (insert + head advance).
 */

import type {
  Branch,
  BranchId,
  QueryVersion,
  TagId,
  VersionId,
  VersionTag,
} from '../graph/types.js';

/**
 * Tag filter for branch-scoped version lookups; a null value matches any value
 */
export interface TagFilter {
  key: string;
  value: string | null;
}

export interface VersionStore {
  // Branches
  insertBranch(branch: Branch): Promise<void>;
  getBranch(id: BranchId): Promise<Branch | null>;
  getBranchByName(name: string): Promise<Branch | null>;
  /** Newest first */
  listBranches(): Promise<Branch[]>;

  // Versions
  /**
   * Insert the version and point its branch's head at it, atomically.
   * Rejects with NotFoundError when the branch does not exist.
   */
  saveVersion(version: QueryVersion): Promise<void>;
  getVersion(id: VersionId): Promise<QueryVersion | null>;
  /** Newest first, insertion order breaking timestamp ties */
  listVersionsByBranch(branchId: BranchId): Promise<QueryVersion[]>;
  listVersionsByTag(branchId: BranchId, filter: TagFilter): Promise<QueryVersion[]>;

  // Tags
  /** Rejects with ConflictError on a duplicate (version, key, value) */
  insertTag(tag: VersionTag): Promise<void>;
  /** @returns false when no row matched */
  deleteTag(id: TagId): Promise<boolean>;
  findTag(versionId: VersionId, key: string, value: string): Promise<VersionTag | null>;
  /** Oldest first */
  getTagsForVersion(versionId: VersionId): Promise<VersionTag[]>;
  getTagsForVersions(versionIds: VersionId[]): Promise<Map<VersionId, VersionTag[]>>;

  close(): Promise<void>;
}
