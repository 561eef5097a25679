/**
 * @fileoverview Migration Types
 */

import type Database from 'better-sqlite3';

export interface Migration {
  /** Unique version number (must be sequential) */
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}

export interface SchemaVersionRow {
  version: number;
  applied_at: string;
  description: string | null;
}

export interface MigrationResult {
  fromVersion: number;
  toVersion: number;
  applied: number[];
  migrated: boolean;
}
