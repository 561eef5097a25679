/**
 * @fileoverview Error hierarchy
 *
 * Typed errors carry a stable code so callers (and the RPC layer) branch on
 * `error.code` instead of parsing messages.
 */

export const ErrorCode = {
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  INVALID_PARAMS: 'INVALID_PARAMS',
  EXTERNAL_FAILURE: 'EXTERNAL_FAILURE',
  PERSISTENCE_FAILURE: 'PERSISTENCE_FAILURE',
  METHOD_NOT_FOUND: 'METHOD_NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class
 */
export class QueryTrailError extends Error {
  readonly name: string = 'QueryTrailError';

  constructor(
    public readonly code: ErrorCodeType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A branch, version or tag id matched no row
 */
export class NotFoundError extends QueryTrailError {
  readonly name: string = 'NotFoundError';

  constructor(
    public readonly entity: 'branch' | 'version' | 'tag',
    public readonly id: string
  ) {
    super(ErrorCode.NOT_FOUND, `${entity} not found: ${id}`);
  }
}

/**
 * Duplicate write rejected by a uniqueness rule
 */
export class ConflictError extends QueryTrailError {
  readonly name: string = 'ConflictError';

  constructor(message: string) {
    super(ErrorCode.CONFLICT, message);
  }
}

export class InvalidParamsError extends QueryTrailError {
  readonly name: string = 'InvalidParamsError';

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(ErrorCode.INVALID_PARAMS, message);
  }
}

/**
 * The analytical engine could not be reached or rejected a request
 */
export class ExternalFailureError extends QueryTrailError {
  readonly name: string = 'ExternalFailureError';

  constructor(message: string, cause?: unknown) {
    super(ErrorCode.EXTERNAL_FAILURE, message, { cause });
  }
}

/**
 * The persistence layer failed on read or write
 */
export class PersistenceError extends QueryTrailError {
  readonly name: string = 'PersistenceError';

  constructor(message: string, cause?: unknown) {
    super(ErrorCode.PERSISTENCE_FAILURE, message, { cause });
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isQueryTrailError(value: unknown): value is QueryTrailError {
  return value instanceof QueryTrailError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
