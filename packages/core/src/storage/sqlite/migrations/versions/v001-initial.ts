/**
 * @fileoverview Initial schema: branches, versions, tags
 */

import type { Migration } from '../types.js';

export const migration: Migration = {
  version: 1,
  description: 'Initial schema with branches, query versions and version tags',
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS branches (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        parent_branch_id TEXT,
        branch_from_version_id TEXT,
        current_version_id TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_branches_name ON branches(name);
      CREATE INDEX IF NOT EXISTS idx_branches_created ON branches(created_at DESC);

      CREATE TABLE IF NOT EXISTS query_versions (
        id TEXT PRIMARY KEY,
        branch_id TEXT NOT NULL REFERENCES branches(id),
        query TEXT NOT NULL,
        query_hash TEXT NOT NULL,
        explain_results TEXT NOT NULL DEFAULT '[]',
        execution_stats TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL,
        parent_version_id TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_versions_branch ON query_versions(branch_id, created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_versions_hash ON query_versions(query_hash);

      CREATE TABLE IF NOT EXISTS version_tags (
        id TEXT PRIMARY KEY,
        version_id TEXT NOT NULL REFERENCES query_versions(id),
        tag_key TEXT NOT NULL,
        tag_value TEXT NOT NULL DEFAULT '',
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tags_version ON version_tags(version_id);
      CREATE INDEX IF NOT EXISTS idx_tags_key ON version_tags(tag_key, tag_value);
    `);
  },
};
