/**
 * @fileoverview SQLite-backed VersionStore
 *
 * better-sqlite3 is synchronous; methods are async only to satisfy the
 * store contract. Driver errors surface as PersistenceError; domain errors
 * (NotFound, Conflict) pass through unchanged.
 */

import type Database from 'better-sqlite3';
import {
  ConflictError,
  NotFoundError,
  PersistenceError,
  isQueryTrailError,
  toErrorMessage,
} from '../../errors/index.js';
import type {
  Branch,
  BranchId,
  QueryVersion,
  TagId,
  VersionId,
  VersionTag,
} from '../../graph/types.js';
import { createLogger } from '../../logging/index.js';
import type { TagFilter, VersionStore } from '../types.js';
import { DatabaseConnection } from './database.js';
import { runMigrations } from './migrations/index.js';
import {
  BranchRepository,
  TagRepository,
  VersionRepository,
  isUniqueViolation,
} from './repositories/index.js';
import type { DatabaseConfig } from './types.js';

const logger = createLogger('sqlite-store');

export class SqliteVersionStore implements VersionStore {
  private readonly connection: DatabaseConnection;
  private readonly branches: BranchRepository;
  private readonly versions: VersionRepository;
  private readonly tags: TagRepository;
  private initialized = false;

  constructor(dbPath: string, config?: Partial<Omit<DatabaseConfig, 'dbPath'>>) {
    this.connection = new DatabaseConnection(dbPath, config);
    this.branches = new BranchRepository(this.connection);
    this.versions = new VersionRepository(this.connection);
    this.tags = new TagRepository(this.connection);
  }

  /**
   * Open the database and apply pending migrations
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const db = this.connection.open();
    const result = runMigrations(db);
    if (result.migrated) {
      logger.info('Applied migrations', {
        from: result.fromVersion,
        to: result.toVersion,
        applied: result.applied,
      });
    }
    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Underlying database handle, for maintenance and tests
   */
  getDatabase(): Database.Database {
    return this.connection.getDatabase();
  }

  async close(): Promise<void> {
    this.connection.close();
    this.initialized = false;
  }

  // ===========================================================================
  // Branches
  // ===========================================================================

  async insertBranch(branch: Branch): Promise<void> {
    this.guard('insert branch', () => this.branches.insert(branch));
  }

  async getBranch(id: BranchId): Promise<Branch | null> {
    return this.guard('read branch', () => this.branches.getById(id));
  }

  async getBranchByName(name: string): Promise<Branch | null> {
    return this.guard('read branch', () => this.branches.getByName(name));
  }

  async listBranches(): Promise<Branch[]> {
    return this.guard('list branches', () => this.branches.listAll());
  }

  // ===========================================================================
  // Versions
  // ===========================================================================

  async saveVersion(version: QueryVersion): Promise<void> {
    this.guard('save version', () =>
      this.connection.transaction(() => {
        if (!this.branches.exists(version.branchId)) {
          throw new NotFoundError('branch', version.branchId);
        }
        this.versions.insert(version);
        this.branches.updateHead(version.branchId, version.id);
      })
    );
  }

  async getVersion(id: VersionId): Promise<QueryVersion | null> {
    return this.guard('read version', () => this.versions.getById(id));
  }

  async listVersionsByBranch(branchId: BranchId): Promise<QueryVersion[]> {
    return this.guard('list versions', () => this.versions.listByBranch(branchId));
  }

  async listVersionsByTag(branchId: BranchId, filter: TagFilter): Promise<QueryVersion[]> {
    return this.guard('list versions by tag', () => this.versions.listByTag(branchId, filter));
  }

  // ===========================================================================
  // Tags
  // ===========================================================================

  async insertTag(tag: VersionTag): Promise<void> {
    try {
      this.tags.insert(tag);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Tag already exists on version ${tag.versionId}`);
      }
      throw this.wrap('insert tag', error);
    }
  }

  async deleteTag(id: TagId): Promise<boolean> {
    return this.guard('delete tag', () => this.tags.delete(id));
  }

  async findTag(versionId: VersionId, key: string, value: string): Promise<VersionTag | null> {
    return this.guard('read tag', () => this.tags.find(versionId, key, value));
  }

  async getTagsForVersion(versionId: VersionId): Promise<VersionTag[]> {
    return this.guard('read tags', () => this.tags.getByVersion(versionId));
  }

  async getTagsForVersions(versionIds: VersionId[]): Promise<Map<VersionId, VersionTag[]>> {
    return this.guard('read tags', () => this.tags.getByVersions(versionIds));
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw this.wrap(operation, error);
    }
  }

  private wrap(operation: string, error: unknown): Error {
    if (isQueryTrailError(error)) {
      return error;
    }
    logger.error(`Failed to ${operation}`, { error: toErrorMessage(error) });
    return new PersistenceError(`Failed to ${operation}: ${toErrorMessage(error)}`, error);
  }
}

/**
 * Create and initialize a store in one step
 */
export async function createSqliteVersionStore(
  dbPath: string,
  config?: Partial<Omit<DatabaseConfig, 'dbPath'>>
): Promise<SqliteVersionStore> {
  const store = new SqliteVersionStore(dbPath, config);
  await store.initialize();
  return store;
}
