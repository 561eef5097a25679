/**
 * @fileoverview Handler registration
 */

import { MethodRegistry } from '../registry.js';
import { createBranchHandlers } from './branch.handler.js';
import { createExplainHandlers } from './explain.handler.js';
import { createSystemHandlers } from './system.handler.js';
import { createTagHandlers } from './tag.handler.js';
import { createVersionHandlers } from './version.handler.js';

export function registerAllHandlers(registry: MethodRegistry): void {
  registry.registerAll([
    ...createBranchHandlers(),
    ...createVersionHandlers(),
    ...createTagHandlers(),
    ...createExplainHandlers(),
    ...createSystemHandlers(),
  ]);
}

export { createBranchHandlers, createVersionHandlers, createTagHandlers, createExplainHandlers, createSystemHandlers };
