/**
 * @fileoverview Version Tag Repository
 */

import { BaseRepository } from './base.js';
import { TagId, VersionId, type VersionTag } from '../../../graph/types.js';
import type { TagDbRow } from '../types.js';

export class TagRepository extends BaseRepository {
  insert(tag: VersionTag): void {
    this.run(
      `INSERT INTO version_tags (id, version_id, tag_key, tag_value, created_at)
       VALUES (?, ?, ?, ?, ?)`,
      tag.id,
      tag.versionId,
      tag.tagKey,
      tag.tagValue,
      tag.createdAt
    );
  }

  delete(tagId: TagId): boolean {
    return this.run('DELETE FROM version_tags WHERE id = ?', tagId).changes > 0;
  }

  find(versionId: VersionId, key: string, value: string): VersionTag | null {
    const row = this.get<TagDbRow>(
      'SELECT * FROM version_tags WHERE version_id = ? AND tag_key = ? AND tag_value = ?',
      versionId,
      key,
      value
    );
    return row ? this.rowToTag(row) : null;
  }

  /**
   * Oldest first
   */
  getByVersion(versionId: VersionId): VersionTag[] {
    return this.all<TagDbRow>(
      'SELECT * FROM version_tags WHERE version_id = ? ORDER BY created_at ASC, rowid ASC',
      versionId
    ).map(row => this.rowToTag(row));
  }

  /**
   * Tags for many versions in one query, grouped by version id
   */
  getByVersions(versionIds: VersionId[]): Map<VersionId, VersionTag[]> {
    const grouped = new Map<VersionId, VersionTag[]>();
    if (versionIds.length === 0) {
      return grouped;
    }

    const rows = this.all<TagDbRow>(
      `SELECT * FROM version_tags WHERE version_id IN (${this.inPlaceholders(versionIds)})
       ORDER BY created_at ASC, rowid ASC`,
      ...versionIds
    );
    for (const row of rows) {
      const tag = this.rowToTag(row);
      const list = grouped.get(tag.versionId);
      if (list) {
        list.push(tag);
      } else {
        grouped.set(tag.versionId, [tag]);
      }
    }
    return grouped;
  }

  private rowToTag(row: TagDbRow): VersionTag {
    return {
      id: TagId(row.id),
      versionId: VersionId(row.version_id),
      tagKey: row.tag_key,
      tagValue: row.tag_value,
      createdAt: row.created_at,
    };
  }
}
