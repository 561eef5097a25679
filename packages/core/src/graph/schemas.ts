/**
 * @fileoverview Zod schemas for graph values stored as JSON
 */

import { z } from 'zod';
import type { StatValue } from './types.js';

export const statValueSchema: z.ZodType<StatValue> = z.lazy(() =>
  z.union([z.number(), z.string(), z.boolean(), z.record(z.string(), statValueSchema)])
);

export const executionStatsSchema = z.record(z.string(), statValueSchema);
