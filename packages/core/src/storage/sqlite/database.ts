/**
 * @fileoverview SQLite Database Connection Management
 *
 * Handles connection lifecycle, pragma setup and transactions.
 */

import Database from 'better-sqlite3';
import type { DatabaseConfig } from './types.js';

export const DEFAULT_CONFIG = {
  enableWAL: true,
  busyTimeout: 5000,
} as const;

export class DatabaseConnection {
  private db: Database.Database | null = null;
  private readonly config: Required<DatabaseConfig>;

  constructor(dbPath: string, config?: Partial<Omit<DatabaseConfig, 'dbPath'>>) {
    this.config = {
      dbPath,
      enableWAL: config?.enableWAL ?? DEFAULT_CONFIG.enableWAL,
      busyTimeout: config?.busyTimeout ?? DEFAULT_CONFIG.busyTimeout,
    };
  }

  /**
   * Open the database connection and configure pragmas
   */
  open(): Database.Database {
    if (this.db) {
      return this.db;
    }
    const db = new Database(this.config.dbPath);
    this.configurePragmas(db);
    this.db = db;
    return db;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * @throws Error if the connection has not been opened
   */
  getDatabase(): Database.Database {
    if (!this.db) {
      throw new Error('Database not open. Call open() first.');
    }
    return this.db;
  }

  private configurePragmas(db: Database.Database): void {
    if (this.config.enableWAL) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
    db.pragma('foreign_keys = ON');
    db.pragma('synchronous = NORMAL');
  }

  /**
   * Execute a function within a transaction
   * Note: better-sqlite3 transactions are synchronous
   */
  transaction<T>(fn: () => T): T {
    return this.getDatabase().transaction(fn)();
  }
}
