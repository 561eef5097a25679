/**
 * @fileoverview RPC Middleware Types and Utilities
 *
 * Middleware wrap dispatch for cross-cutting concerns such as logging.
 */

import type { TrailLogger } from '../../logging/index.js';
import type { RpcRequest, RpcResponse } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Middleware receives the request and the rest of the chain. It may modify
 * the request, short-circuit with its own response, or inspect the response.
 */
export type Middleware = (
  request: RpcRequest,
  next: MiddlewareNext
) => Promise<RpcResponse>;

export type MiddlewareNext = (request: RpcRequest) => Promise<RpcResponse>;

// =============================================================================
// Middleware Builder
// =============================================================================

/**
 * Build a middleware chain; the first middleware runs first
 */
export function buildMiddlewareChain(
  middleware: Middleware[],
  handler: MiddlewareNext
): MiddlewareNext {
  let chain: MiddlewareNext = handler;

  for (let i = middleware.length - 1; i >= 0; i--) {
    const mw = middleware[i];
    if (!mw) continue;
    const next = chain;
    chain = (request) => mw(request, next);
  }

  return chain;
}

// =============================================================================
// Common Middleware
// =============================================================================

/**
 * Log every request with its outcome and duration
 */
export function createLoggingMiddleware(logger: TrailLogger): Middleware {
  return async (request, next) => {
    const start = performance.now();
    const response = await next(request);
    const durationMs = (performance.now() - start).toFixed(2);

    if (response.error) {
      logger.warn(`RPC error: ${request.method}`, {
        id: request.id,
        code: response.error.code,
        message: response.error.message,
        durationMs,
      });
    } else {
      logger.debug(`RPC success: ${request.method}`, { id: request.id, durationMs });
    }
    return response;
  };
}
