/**
 * @fileoverview Auto-Branch Policy
 *
 * Editing anything but a branch's head forks a new branch at the edited
 * version. A failed fork degrades to writing on the named branch with a
 * warning; it never aborts the edit.
 */

import { toErrorMessage } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import type { Branch, BranchId, VersionId } from './types.js';
import type { VersionGraph } from './version-graph.js';

const logger = createLogger('auto-branch');

export interface AutoBranchDecision {
  /** Branch the new version should be written to */
  targetBranchId: BranchId;
  autoBranched: boolean;
  newBranch: Branch | null;
  /** Set when a fork was required but could not be created */
  warning: string | null;
}

export interface AutoBranchPolicyOptions {
  /** Clock used for fork names */
  now?: () => Date;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local-time fork name, e.g. `branch-2024-03-01-14:05:09`
 */
export function autoBranchName(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `branch-${day}-${time}`;
}

export class AutoBranchPolicy {
  private readonly now: () => Date;

  constructor(
    private readonly graph: VersionGraph,
    options: AutoBranchPolicyOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Decide where an edit based on `parentVersionId` lands, forking when the
   * parent is not the head of `branchId`
   */
  async resolve(branchId: BranchId, parentVersionId: VersionId | null | undefined): Promise<AutoBranchDecision> {
    const direct: AutoBranchDecision = {
      targetBranchId: branchId,
      autoBranched: false,
      newBranch: null,
      warning: null,
    };

    if (!parentVersionId) {
      return direct;
    }

    const branch = await this.graph.getBranch(branchId);
    if (!branch || branch.currentVersionId === parentVersionId) {
      return direct;
    }

    const name = autoBranchName(this.now());
    try {
      const newBranch = await this.graph.createBranch(name, branchId, parentVersionId);
      logger.info('Auto-created branch for non-head edit', {
        branchId: newBranch.id,
        name,
        fromBranchId: branchId,
        fromVersionId: parentVersionId,
      });
      return { targetBranchId: newBranch.id, autoBranched: true, newBranch, warning: null };
    } catch (error) {
      const warning = `Failed to auto-create branch: ${toErrorMessage(error)}`;
      logger.warn(warning, { branchId, parentVersionId });
      return { ...direct, warning };
    }
  }
}
