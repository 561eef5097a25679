/**
 * @fileoverview Main entry point for @querytrail/core
 *
 * Version control for a single analytical query: branches, immutable
 * versions with their EXPLAIN diagnostics, tags, result reuse and
 * auto-branching, plus the SQLite store, ClickHouse adapter and RPC layer.
 */

export * from './logging/index.js';
export * from './errors/index.js';
export * from './settings/index.js';
export * from './utils/index.js';
export * from './tags/index.js';
export * from './explain/index.js';
export * from './engine/index.js';
export * from './graph/index.js';
export * from './storage/index.js';
export * from './services/index.js';
export * from './rpc/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'querytrail';
