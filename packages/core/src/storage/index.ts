/**
 * @fileoverview Persistence exports
 */

export type { VersionStore, TagFilter } from './types.js';
export * from './sqlite/index.js';
