/**
 * @fileoverview Zod schemas for diagnostic configs and results
 *
 * Shared by the RPC param validation and by the SQLite store when it reads
 * stored result batches back.
 */

import { z } from 'zod';
import { EXPLAIN_TYPES } from './types.js';

export const explainTypeSchema = z.enum(EXPLAIN_TYPES);

/**
 * Unknown setting names are accepted and ignored by the builder
 */
export const explainSettingsSchema = z.record(z.string(), z.number().int());

export const explainConfigSchema = z.object({
  type: explainTypeSchema,
  settings: explainSettingsSchema.default({}),
  enabled: z.boolean().default(true),
});

export const estimateRowSchema = z.object({
  database: z.string(),
  table: z.string(),
  parts: z.coerce.number(),
  rows: z.coerce.number(),
  marks: z.coerce.number(),
});

export const explainResultSchema = z.object({
  type: explainTypeSchema,
  output: z.string(),
  estimate: z.array(estimateRowSchema).optional(),
  error: z.string().optional(),
});

export const explainResultsSchema = z.array(explainResultSchema);
