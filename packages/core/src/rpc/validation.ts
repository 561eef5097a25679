/**
 * @fileoverview Param validation helpers
 */

import type { z, ZodError } from 'zod';
import { InvalidParamsError } from '../errors/index.js';

export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

export function zodErrorToValidationErrors(error: ZodError): ValidationError[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.') || 'params',
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format validation errors into a human-readable message
 */
export function formatValidationMessage(errors: ValidationError[]): string {
  const [first] = errors;
  if (errors.length === 1 && first) {
    return first.path === 'params' ? first.message : `${first.path}: ${first.message}`;
  }
  return errors.map((e) => `${e.path}: ${e.message}`).join('; ');
}

/**
 * Validate request params against a schema
 * @throws InvalidParamsError carrying the individual issues as details
 */
export function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
  const result = schema.safeParse(params ?? {});
  if (!result.success) {
    const errors = zodErrorToValidationErrors(result.error);
    throw new InvalidParamsError(formatValidationMessage(errors), { errors });
  }
  return result.data;
}
