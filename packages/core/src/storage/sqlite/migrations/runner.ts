/**
 * @fileoverview Migration Runner
 *
 * Tracks applied migrations in `schema_version` and applies pending ones in
 * version order, each inside its own transaction.
 */

import type Database from 'better-sqlite3';
import type { Migration, MigrationResult, SchemaVersionRow } from './types.js';

export class MigrationRunner {
  private readonly migrations: Migration[];

  constructor(
    private readonly db: Database.Database,
    migrations: Migration[]
  ) {
    this.migrations = [...migrations].sort((a, b) => a.version - b.version);
  }

  run(): MigrationResult {
    this.ensureVersionTable();

    const fromVersion = this.getCurrentVersion();
    const applied: number[] = [];

    for (const migration of this.getPendingMigrations()) {
      this.db.transaction(() => {
        migration.up(this.db);
        this.recordMigration(migration);
      })();
      applied.push(migration.version);
    }

    return {
      fromVersion,
      toVersion: this.getCurrentVersion(),
      applied,
      migrated: applied.length > 0,
    };
  }

  getCurrentVersion(): number {
    if (!this.tableExists('schema_version')) {
      return 0;
    }
    const row = this.db
      .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
      .get();
    return row?.version ?? 0;
  }

  tableExists(tableName: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' AND name=?")
      .get(tableName);
    return row !== undefined;
  }

  getAppliedMigrations(): SchemaVersionRow[] {
    if (!this.tableExists('schema_version')) {
      return [];
    }
    return this.db
      .prepare<[], SchemaVersionRow>('SELECT * FROM schema_version ORDER BY version')
      .all();
  }

  getPendingMigrations(): Migration[] {
    const currentVersion = this.getCurrentVersion();
    return this.migrations.filter(m => m.version > currentVersion);
  }

  private ensureVersionTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL,
        description TEXT
      )
    `);
  }

  private recordMigration(migration: Migration): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO schema_version (version, applied_at, description)
         VALUES (?, datetime('now'), ?)`
      )
      .run(migration.version, migration.description);
  }
}
