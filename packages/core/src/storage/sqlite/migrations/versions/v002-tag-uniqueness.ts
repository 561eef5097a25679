/**
 * @fileoverview Unique (version, key, value) constraint on tags
 */

import type { Migration } from '../types.js';

export const migration: Migration = {
  version: 2,
  description: 'Unique index on version_tags(version_id, tag_key, tag_value)',
  up: (db) => {
    // Keep the oldest of any duplicates written before the index existed
    db.exec(`
      DELETE FROM version_tags
      WHERE rowid NOT IN (
        SELECT MIN(rowid) FROM version_tags GROUP BY version_id, tag_key, tag_value
      );

      CREATE UNIQUE INDEX IF NOT EXISTS idx_tags_unique
        ON version_tags(version_id, tag_key, tag_value);
    `);
  },
};
