/**
 * @fileoverview Query Version Repository
 *
 * Rows are insert-only. Result batches and statistics are stored as JSON
 * text and validated when read back.
 */

import { BaseRepository, parseJsonColumn } from './base.js';
import { explainResultsSchema } from '../../../explain/schemas.js';
import { executionStatsSchema } from '../../../graph/schemas.js';
import { BranchId, VersionId, type QueryVersion } from '../../../graph/types.js';
import type { TagFilter } from '../../types.js';
import type { VersionDbRow } from '../types.js';

export class VersionRepository extends BaseRepository {
  insert(version: QueryVersion): void {
    this.run(
      `INSERT INTO query_versions
         (id, branch_id, query, query_hash, explain_results, execution_stats, created_at, parent_version_id)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      version.id,
      version.branchId,
      version.query,
      version.queryHash,
      JSON.stringify(version.explainResults),
      JSON.stringify(version.executionStats),
      version.createdAt,
      version.parentVersionId
    );
  }

  getById(versionId: VersionId): QueryVersion | null {
    const row = this.get<VersionDbRow>('SELECT * FROM query_versions WHERE id = ?', versionId);
    return row ? this.rowToVersion(row) : null;
  }

  /**
   * Newest first; rowid breaks ties between equal timestamps
   */
  listByBranch(branchId: BranchId): QueryVersion[] {
    return this.all<VersionDbRow>(
      'SELECT * FROM query_versions WHERE branch_id = ? ORDER BY created_at DESC, rowid DESC',
      branchId
    ).map(row => this.rowToVersion(row));
  }

  listByTag(branchId: BranchId, filter: TagFilter): QueryVersion[] {
    const valueClause = filter.value === null ? '' : ' AND t.tag_value = ?';
    const params: unknown[] = [branchId, filter.key];
    if (filter.value !== null) {
      params.push(filter.value);
    }
    return this.all<VersionDbRow>(
      `SELECT v.* FROM query_versions v
       WHERE v.branch_id = ?
         AND EXISTS (
           SELECT 1 FROM version_tags t
           WHERE t.version_id = v.id AND t.tag_key = ?${valueClause}
         )
       ORDER BY v.created_at DESC, v.rowid DESC`,
      ...params
    ).map(row => this.rowToVersion(row));
  }

  private rowToVersion(row: VersionDbRow): QueryVersion {
    return {
      id: VersionId(row.id),
      branchId: BranchId(row.branch_id),
      query: row.query,
      queryHash: row.query_hash,
      explainResults: parseJsonColumn(row.explain_results, explainResultsSchema, 'explain_results'),
      executionStats: parseJsonColumn(row.execution_stats, executionStatsSchema, 'execution_stats'),
      createdAt: row.created_at,
      parentVersionId: row.parent_version_id ? VersionId(row.parent_version_id) : null,
    };
  }
}
