/**
 * @fileoverview Identifier and timestamp helpers shared by the graph and tag layers
 */

import * as crypto from 'crypto';

/**
 * Random hex identifier with an entity prefix (e.g. `br_1a2b3c4d5e6f`)
 */
export function generateId(prefix: string, length = 12): string {
  const random = crypto.randomUUID().replace(/-/g, '').slice(0, length);
  return `${prefix}_${random}`;
}

export function nowIso(): string {
  return new Date().toISOString();
}
