/**
 * @fileoverview Default Settings
 *
 * Fallback values when user settings are not specified.
 */

import type { QueryTrailSettings } from './types.js';

export const DEFAULT_SETTINGS: QueryTrailSettings = {
  storage: {
    dbPath: 'querytrail.db',
  },
  clickhouse: {
    url: 'http://localhost:8123',
    username: 'default',
    password: '',
    database: 'default',
    requestTimeoutMs: 30000,
  },
  server: {
    host: '127.0.0.1',
    port: 8080,
  },
  explain: {
    defaultMaxExecutionTimeMs: 1345,
    product: 'querytrail',
  },
};
