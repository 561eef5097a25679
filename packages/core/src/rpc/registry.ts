/**
 * @fileoverview RPC Method Registry
 *
 * Maps method names to handlers and dispatches requests through the
 * middleware chain. Handlers return their result or throw; thrown
 * QueryTrailErrors keep their code in the error response, anything else
 * becomes INTERNAL_ERROR.
 */

import { ErrorCode, isQueryTrailError, InvalidParamsError, toErrorMessage } from '../errors/index.js';
import { createLogger } from '../logging/index.js';
import { buildMiddlewareChain, type Middleware, type MiddlewareNext } from './middleware/index.js';
import type { RpcContext, RpcRequest, RpcResponse } from './types.js';

const logger = createLogger('rpc');

// =============================================================================
// Types
// =============================================================================

export type MethodHandler<TResult = unknown> = (
  request: RpcRequest,
  context: RpcContext
) => Promise<TResult>;

export interface MethodOptions {
  /** Allow overwriting an existing registration */
  force?: boolean;
  description?: string;
}

export interface MethodRegistration {
  method: string;
  handler: MethodHandler;
  options?: MethodOptions;
}

export interface MethodDescription {
  method: string;
  description: string;
}

interface RegistrationEntry {
  handler: MethodHandler;
  options?: MethodOptions;
}

// =============================================================================
// Registry Implementation
// =============================================================================

/**
 * @example
 * ```typescript
 * const registry = new MethodRegistry();
 * registry.register('system.ping', async (_req, ctx) => pingEngine(ctx.engine));
 * const response = await registry.dispatch(request, context);
 * ```
 */
export class MethodRegistry {
  private readonly handlers: Map<string, RegistrationEntry> = new Map();
  private readonly middleware: Middleware[] = [];

  /**
   * @throws If the method is already registered (unless force: true)
   */
  register(method: string, handler: MethodHandler, options?: MethodOptions): void {
    if (this.handlers.has(method) && !options?.force) {
      throw new Error(`Method "${method}" is already registered`);
    }
    this.handlers.set(method, { handler, options });
  }

  registerAll(registrations: MethodRegistration[]): void {
    for (const { method, handler, options } of registrations) {
      this.register(method, handler, options);
    }
  }

  /**
   * Middleware run in registration order
   */
  use(mw: Middleware): void {
    this.middleware.push(mw);
  }

  has(method: string): boolean {
    return this.handlers.has(method);
  }

  list(): string[] {
    return Array.from(this.handlers.keys());
  }

  /**
   * Registered methods with their descriptions, in registration order
   */
  describeAll(): MethodDescription[] {
    return Array.from(this.handlers, ([method, entry]) => ({
      method,
      description: entry.options?.description ?? '',
    }));
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  async dispatch(request: RpcRequest, context: RpcContext): Promise<RpcResponse> {
    const core: MiddlewareNext = (req) => this.dispatchCore(req, context);
    if (this.middleware.length === 0) {
      return core(request);
    }
    return buildMiddlewareChain(this.middleware, core)(request);
  }

  private async dispatchCore(request: RpcRequest, context: RpcContext): Promise<RpcResponse> {
    const entry = this.handlers.get(request.method);
    if (!entry) {
      return MethodRegistry.errorResponse(
        request.id,
        ErrorCode.METHOD_NOT_FOUND,
        `Unknown method: ${request.method}`
      );
    }

    try {
      const result = await entry.handler(request, context);
      return MethodRegistry.successResponse(request.id, result);
    } catch (error) {
      if (isQueryTrailError(error)) {
        const details = error instanceof InvalidParamsError ? error.details : undefined;
        return MethodRegistry.errorResponse(request.id, error.code, error.message, details);
      }
      logger.error(`Unhandled error in ${request.method}`, error instanceof Error ? error : { error: toErrorMessage(error) });
      return MethodRegistry.errorResponse(request.id, ErrorCode.INTERNAL_ERROR, toErrorMessage(error));
    }
  }

  // ===========================================================================
  // Response Helpers
  // ===========================================================================

  static successResponse(id: string | number, result: unknown): RpcResponse {
    return {
      id: String(id),
      success: true,
      result,
    };
  }

  static errorResponse(
    id: string | number,
    code: string,
    message: string,
    details?: unknown
  ): RpcResponse {
    return {
      id: String(id),
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
    };
  }
}
