/**
 * @fileoverview Migration System Exports
 */

import type Database from 'better-sqlite3';
import { MigrationRunner } from './runner.js';
import type { Migration, MigrationResult } from './types.js';
import { migration as v001Initial } from './versions/v001-initial.js';
import { migration as v002TagUniqueness } from './versions/v002-tag-uniqueness.js';

/**
 * All registered migrations in order
 */
export const migrations: Migration[] = [
  v001Initial,
  v002TagUniqueness,
];

/**
 * Run all pending migrations on the database
 */
export function runMigrations(db: Database.Database): MigrationResult {
  return new MigrationRunner(db, migrations).run();
}

export { MigrationRunner } from './runner.js';
export type { Migration, MigrationResult, SchemaVersionRow } from './types.js';
