/**
 * @fileoverview Version Graph
 *
 * Sole writer of branches and versions. Versions are immutable; a branch's
 * head pointer only moves when a version is saved to it, and the store makes
 * that insert-and-advance atomic.
 */

import { InvalidParamsError } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { VersionStore } from '../storage/types.js';
import { nowIso } from '../utils/ids.js';
import {
  newBranchId,
  type Branch,
  type BranchId,
  type QueryVersion,
  type VersionId,
  type VersionWithTags,
} from './types.js';

const logger = createLogger('version-graph');

export const MAIN_BRANCH_NAME = 'main';

export class VersionGraph {
  constructor(private readonly store: VersionStore) {}

  /**
   * Create a branch with an empty head. Parent references are stored as
   * given; the caller is responsible for their consistency.
   */
  async createBranch(
    name: string,
    parentBranchId: BranchId | null = null,
    branchFromVersionId: VersionId | null = null
  ): Promise<Branch> {
    if (name.trim() === '') {
      throw new InvalidParamsError('Branch name must not be empty');
    }

    const branch: Branch = {
      id: newBranchId(),
      name,
      parentBranchId,
      branchFromVersionId,
      currentVersionId: null,
      createdAt: nowIso(),
    };
    await this.store.insertBranch(branch);
    logger.debug('Branch created', { branchId: branch.id, name });
    return branch;
  }

  /**
   * Persist a version and advance its branch head to it, as one unit.
   * The caller assigns the id and branch id.
   */
  async saveVersion(version: QueryVersion): Promise<QueryVersion> {
    if (!version.id) {
      throw new InvalidParamsError('Version id must be set before saving');
    }
    if (!version.branchId) {
      throw new InvalidParamsError('Version branch id must be set before saving');
    }
    if (version.parentVersionId) {
      const parent = await this.store.getVersion(version.parentVersionId);
      if (!parent) {
        throw new InvalidParamsError(`Parent version does not exist: ${version.parentVersionId}`);
      }
    }

    await this.store.saveVersion(version);
    logger.debug('Version saved', { versionId: version.id, branchId: version.branchId });
    return version;
  }

  /**
   * Every version of the branch, newest first, each with its tags
   */
  async getBranchHistory(branchId: BranchId): Promise<VersionWithTags[]> {
    const versions = await this.store.listVersionsByBranch(branchId);
    if (versions.length === 0) {
      return [];
    }
    const tags = await this.store.getTagsForVersions(versions.map(v => v.id));
    return versions.map(version => ({ ...version, tags: tags.get(version.id) ?? [] }));
  }

  getVersion(id: VersionId): Promise<QueryVersion | null> {
    return this.store.getVersion(id);
  }

  getBranch(id: BranchId): Promise<Branch | null> {
    return this.store.getBranch(id);
  }

  listBranches(): Promise<Branch[]> {
    return this.store.listBranches();
  }

  /**
   * Create the root `main` branch on first start
   */
  async ensureMainBranch(): Promise<Branch> {
    const existing = await this.store.getBranchByName(MAIN_BRANCH_NAME);
    if (existing) {
      return existing;
    }
    const branch = await this.createBranch(MAIN_BRANCH_NAME);
    logger.info('Created main branch', { branchId: branch.id });
    return branch;
  }
}
