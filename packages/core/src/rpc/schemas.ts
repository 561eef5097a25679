/**
 * @fileoverview Param schemas for every RPC method
 */

import { z } from 'zod';
import { explainConfigSchema } from '../explain/schemas.js';
import { executionStatsSchema } from '../graph/schemas.js';
import { BranchId, TagId, VersionId } from '../graph/types.js';

const branchId = z.string().min(1, 'branchId is required').transform(BranchId);
const versionId = z.string().min(1, 'versionId is required').transform(VersionId);
const tagId = z.string().min(1, 'tagId is required').transform(TagId);

/** Empty string and null both mean "no reference" */
const optionalBranchId = z
  .string()
  .nullish()
  .transform((id) => (id ? BranchId(id) : null));
const optionalVersionId = z
  .string()
  .nullish()
  .transform((id) => (id ? VersionId(id) : null));

export const branchGetSchema = z.object({ branchId });

export const branchCreateSchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  parentBranchId: optionalBranchId,
  branchFromVersionId: optionalVersionId,
  initialQuery: z.string().optional(),
  createInitialVersion: z.boolean().optional(),
});

export const branchHistorySchema = z.object({ branchId });

export const versionGetSchema = z.object({ versionId });

export const versionByTagSchema = z.object({
  branchId,
  tag: z.string().min(1, 'tag is required'),
});

export const explainRunSchema = z.object({
  branchId,
  query: z.string(),
  parentVersionId: optionalVersionId,
  explainConfigs: z.array(explainConfigSchema).optional(),
  forceAnalyzer: z.boolean().optional(),
  serverSettings: z.record(z.string(), z.string()).optional(),
  maxExecutionTimeMs: z.number().int().max(Number.MAX_SAFE_INTEGER).optional(),
  executionStats: executionStatsSchema.optional(),
});

export const tagListSchema = z.object({ versionId });

export const tagAddSchema = z.object({
  versionId,
  tag: z.string().min(1, 'tag is required'),
});

export const tagRemoveSchema = z.object({ tagId });

export const tagToggleStarSchema = z.object({ versionId });
