/**
 * @fileoverview SQLite persistence exports
 */

export { SqliteVersionStore, createSqliteVersionStore } from './sqlite-store.js';
export { DatabaseConnection } from './database.js';
export { runMigrations, migrations, MigrationRunner } from './migrations/index.js';
export type { DatabaseConfig } from './types.js';
