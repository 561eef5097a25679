/**
 * @fileoverview Base Repository
 *
 * Common query helpers shared by the entity repositories.
 */

import type Database from 'better-sqlite3';
import type { z } from 'zod';
import { PersistenceError, toErrorMessage } from '../../../errors/index.js';
import type { DatabaseConnection } from '../database.js';

/**
 * Base class for all repositories
 *
 * Repositories encapsulate SQL and row-to-entity conversion for one table.
 */
export abstract class BaseRepository {
  constructor(protected readonly connection: DatabaseConnection) {}

  protected get db(): Database.Database {
    return this.connection.getDatabase();
  }

  protected all<T>(sql: string, ...params: unknown[]): T[] {
    return this.db.prepare<unknown[], T>(sql).all(...params);
  }

  protected get<T>(sql: string, ...params: unknown[]): T | undefined {
    return this.db.prepare<unknown[], T>(sql).get(...params);
  }

  protected run(sql: string, ...params: unknown[]): Database.RunResult {
    return this.db.prepare(sql).run(...params);
  }

  /**
   * Build IN clause placeholders for array parameters
   */
  protected inPlaceholders(items: unknown[]): string {
    return items.map(() => '?').join(',');
  }
}

/**
 * Decode a JSON text column and validate its shape
 * @throws PersistenceError when the stored text is not valid for the schema
 */
export function parseJsonColumn<T>(
  json: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  column: string
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new PersistenceError(`Corrupt JSON in column ${column}: ${toErrorMessage(error)}`, error);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new PersistenceError(`Unexpected value in column ${column}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * SQLite unique-constraint violation raised by better-sqlite3
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}
