/**
 * @fileoverview RPC exports
 */

import { createLogger } from '../logging/index.js';
import { registerAllHandlers } from './handlers/index.js';
import { createLoggingMiddleware } from './middleware/index.js';
import { MethodRegistry } from './registry.js';

export * from './types.js';
export {
  MethodRegistry,
  type MethodDescription,
  type MethodHandler,
  type MethodOptions,
  type MethodRegistration,
} from './registry.js';
export {
  buildMiddlewareChain,
  createLoggingMiddleware,
  type Middleware,
  type MiddlewareNext,
} from './middleware/index.js';
export { parseParams, zodErrorToValidationErrors, formatValidationMessage, type ValidationError } from './validation.js';
export { registerAllHandlers } from './handlers/index.js';
export { createRpcContext, type RpcContextDeps } from './context.js';

/**
 * Registry with every method and request logging installed
 */
export function createMethodRegistry(): MethodRegistry {
  const registry = new MethodRegistry();
  registry.use(createLoggingMiddleware(createLogger('rpc')));
  registerAllHandlers(registry);
  return registry;
}
