/**
 * @fileoverview Branch Repository
 */

import { BaseRepository } from './base.js';
import { BranchId, VersionId, type Branch } from '../../../graph/types.js';
import type { BranchDbRow } from '../types.js';

export class BranchRepository extends BaseRepository {
  insert(branch: Branch): void {
    this.run(
      `INSERT INTO branches (id, name, parent_branch_id, branch_from_version_id, current_version_id, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      branch.id,
      branch.name,
      branch.parentBranchId,
      branch.branchFromVersionId,
      branch.currentVersionId,
      branch.createdAt
    );
  }

  getById(branchId: BranchId): Branch | null {
    const row = this.get<BranchDbRow>('SELECT * FROM branches WHERE id = ?', branchId);
    return row ? this.rowToBranch(row) : null;
  }

  /**
   * Oldest branch with the name; names are not unique
   */
  getByName(name: string): Branch | null {
    const row = this.get<BranchDbRow>(
      'SELECT * FROM branches WHERE name = ? ORDER BY created_at ASC, rowid ASC LIMIT 1',
      name
    );
    return row ? this.rowToBranch(row) : null;
  }

  listAll(): Branch[] {
    return this.all<BranchDbRow>('SELECT * FROM branches ORDER BY created_at DESC, rowid DESC').map(
      row => this.rowToBranch(row)
    );
  }

  /**
   * Move the head pointer
   * @returns false when the branch does not exist
   */
  updateHead(branchId: BranchId, versionId: VersionId): boolean {
    const result = this.run('UPDATE branches SET current_version_id = ? WHERE id = ?', versionId, branchId);
    return result.changes > 0;
  }

  exists(branchId: BranchId): boolean {
    return this.get<{ id: string }>('SELECT id FROM branches WHERE id = ?', branchId) !== undefined;
  }

  private rowToBranch(row: BranchDbRow): Branch {
    return {
      id: BranchId(row.id),
      name: row.name,
      parentBranchId: row.parent_branch_id ? BranchId(row.parent_branch_id) : null,
      branchFromVersionId: row.branch_from_version_id ? VersionId(row.branch_from_version_id) : null,
      currentVersionId: row.current_version_id ? VersionId(row.current_version_id) : null,
      createdAt: row.created_at,
    };
  }
}
