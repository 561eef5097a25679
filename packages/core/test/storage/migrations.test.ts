/**
 * @fileoverview Tests for the migration runner and schema migrations
 */

import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MigrationRunner, migrations, runMigrations } from '../../src/storage/sqlite/migrations/index.js';
import type { Migration } from '../../src/storage/sqlite/migrations/types.js';
import { migration as v001Initial } from '../../src/storage/sqlite/migrations/versions/v001-initial.js';

describe('MigrationRunner', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('should run migrations in version order', () => {
    const order: number[] = [];
    const unordered: Migration[] = [
      { version: 2, description: 'second', up: () => order.push(2) },
      { version: 1, description: 'first', up: () => order.push(1) },
    ];

    const result = new MigrationRunner(db, unordered).run();

    expect(order).toEqual([1, 2]);
    expect(result).toEqual({ fromVersion: 0, toVersion: 2, applied: [1, 2], migrated: true });
  });

  it('should skip already applied migrations', () => {
    runMigrations(db);
    const result = runMigrations(db);

    expect(result.migrated).toBe(false);
    expect(result.applied).toEqual([]);
    expect(result.fromVersion).toBe(migrations.length);
  });

  it('should roll back a failing migration and keep earlier ones', () => {
    const failing: Migration[] = [
      { version: 1, description: 'ok', up: (d) => d.exec('CREATE TABLE a (id INTEGER)') },
      {
        version: 2,
        description: 'broken',
        up: (d) => {
          d.exec('CREATE TABLE b (id INTEGER)');
          throw new Error('boom');
        },
      },
    ];
    const runner = new MigrationRunner(db, failing);

    expect(() => runner.run()).toThrow('boom');
    expect(runner.getCurrentVersion()).toBe(1);
    expect(runner.tableExists('a')).toBe(true);
    expect(runner.tableExists('b')).toBe(false);
  });

  it('should record applied migrations', () => {
    const runner = new MigrationRunner(db, migrations);
    runner.run();

    expect(runner.getAppliedMigrations().map(m => m.version)).toEqual([1, 2]);
    expect(runner.getPendingMigrations()).toEqual([]);
  });

  describe('schema', () => {
    it('should create the branch, version and tag tables', () => {
      runMigrations(db);
      const runner = new MigrationRunner(db, migrations);

      expect(runner.tableExists('branches')).toBe(true);
      expect(runner.tableExists('query_versions')).toBe(true);
      expect(runner.tableExists('version_tags')).toBe(true);
    });

    it('should dedupe existing tags before adding the unique index', () => {
      new MigrationRunner(db, [v001Initial]).run();
      db.prepare("INSERT INTO branches (id, name, created_at) VALUES ('br_1', 'main', '2024-01-01')").run();
      db.prepare(
        "INSERT INTO query_versions (id, branch_id, query, query_hash, created_at) VALUES ('qv_1', 'br_1', 'SELECT 1', 'h', '2024-01-01')"
      ).run();
      const insertTag = db.prepare(
        "INSERT INTO version_tags (id, version_id, tag_key, tag_value, created_at) VALUES (?, 'qv_1', 'env', 'prod', '2024-01-01')"
      );
      insertTag.run('tag_a');
      insertTag.run('tag_b');

      const result = runMigrations(db);

      expect(result.applied).toEqual([2]);
      const rows = db.prepare<[], { id: string }>('SELECT id FROM version_tags').all();
      expect(rows).toEqual([{ id: 'tag_a' }]);
      expect(() => insertTag.run('tag_c')).toThrow(/UNIQUE/);
    });
  });
});
