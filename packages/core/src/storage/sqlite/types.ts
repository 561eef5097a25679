/**
 * @fileoverview Internal SQLite Types
 *
 * Raw row shapes. Entity types live in graph/types.ts.
 */

/**
 * Configuration for SQLite database connection
 */
export interface DatabaseConfig {
  /** Path to SQLite database file, or ':memory:' for in-memory */
  dbPath: string;
  /** Enable WAL mode (default: true) */
  enableWAL?: boolean;
  /** Busy timeout in milliseconds (default: 5000) */
  busyTimeout?: number;
}

export interface BranchDbRow {
  id: string;
  name: string;
  parent_branch_id: string | null;
  branch_from_version_id: string | null;
  current_version_id: string | null;
  created_at: string;
}

export interface VersionDbRow {
  id: string;
  branch_id: string;
  query: string;
  query_hash: string;
  explain_results: string;
  execution_stats: string;
  created_at: string;
  parent_version_id: string | null;
}

export interface TagDbRow {
  id: string;
  version_id: string;
  tag_key: string;
  tag_value: string;
  created_at: string;
}
