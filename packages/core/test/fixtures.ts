/**
 * @fileoverview Shared test fixtures: in-memory store and a scripted engine
 */

import { ExternalFailureError } from '../src/errors/index.js';
import type { AnalyticalEngine } from '../src/engine/types.js';
import type { EstimateRow } from '../src/explain/types.js';
import { hashQuery } from '../src/graph/hash.js';
import { newVersionId, type BranchId, type QueryVersion } from '../src/graph/types.js';
import { SqliteVersionStore } from '../src/storage/sqlite/sqlite-store.js';

export async function createTestStore(): Promise<SqliteVersionStore> {
  const store = new SqliteVersionStore(':memory:');
  await store.initialize();
  return store;
}

export function makeVersion(
  branchId: BranchId,
  query: string,
  overrides: Partial<QueryVersion> = {}
): QueryVersion {
  return {
    id: newVersionId(),
    branchId,
    query,
    queryHash: hashQuery(query),
    explainResults: [{ type: 'AST', output: 'SelectQuery' }],
    executionStats: {},
    createdAt: new Date().toISOString(),
    parentVersionId: null,
    ...overrides,
  };
}

/**
 * Engine double that answers from scripted responses and records every
 * statement it receives
 */
export class FakeEngine implements AnalyticalEngine {
  readonly statements: string[] = [];
  textLines: string[] = ['line 1', 'line 2'];
  estimateRows: EstimateRow[] = [{ database: 'default', table: 'events', parts: 3, rows: 1200, marks: 10 }];
  settings: Record<string, string> = { enable_analyzer: '1' };
  /** Statements containing this text fail */
  failOn: string | null = null;
  pingError: Error | null = null;
  closed = false;

  async queryText(sql: string): Promise<string[]> {
    this.record(sql);
    return this.textLines;
  }

  async queryEstimate(sql: string): Promise<EstimateRow[]> {
    this.record(sql);
    return this.estimateRows;
  }

  async getSetting(name: string): Promise<string | null> {
    return this.settings[name] ?? null;
  }

  async ping(): Promise<void> {
    if (this.pingError) {
      throw this.pingError;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private record(sql: string): void {
    this.statements.push(sql);
    if (this.failOn !== null && sql.includes(this.failOn)) {
      throw new ExternalFailureError(`engine rejected: ${this.failOn}`);
    }
  }
}
