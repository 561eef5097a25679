/**
 * @fileoverview Query content hashing and the tracing comment built from it
 */

import * as crypto from 'crypto';

/**
 * Lowercase hex SHA-256 of the UTF-8 query text
 */
export function hashQuery(query: string): string {
  return crypto.createHash('sha256').update(query, 'utf8').digest('hex');
}

/**
 * Machine-readable tracing tag sent as the engine's log comment
 */
export function buildLogComment(queryHash: string, product: string): string {
  return JSON.stringify({ product, query_version: queryHash });
}
