/**
 * @fileoverview Branch RPC Handlers
 *
 * - branch.list: All branches, newest first
 * - branch.get: One branch by id
 * - branch.create: Create a branch, optionally seeded with a first version
 * - branch.history: Versions of a branch with their tags
 */

import { NotFoundError } from '../../errors/index.js';
import type { MethodHandler, MethodRegistration } from '../registry.js';
import { branchCreateSchema, branchGetSchema, branchHistorySchema } from '../schemas.js';
import { parseParams } from '../validation.js';

export const handleBranchList: MethodHandler = async (_request, context) => {
  return context.graph.listBranches();
};

export const handleBranchGet: MethodHandler = async (request, context) => {
  const { branchId } = parseParams(branchGetSchema, request.params);
  const branch = await context.graph.getBranch(branchId);
  if (!branch) {
    throw new NotFoundError('branch', branchId);
  }
  return branch;
};

export const handleBranchCreate: MethodHandler = async (request, context) => {
  const params = parseParams(branchCreateSchema, request.params);
  return context.explain.createBranch(params);
};

export const handleBranchHistory: MethodHandler = async (request, context) => {
  const { branchId } = parseParams(branchHistorySchema, request.params);
  return context.graph.getBranchHistory(branchId);
};

export function createBranchHandlers(): MethodRegistration[] {
  return [
    { method: 'branch.list', handler: handleBranchList, options: { description: 'List all branches' } },
    { method: 'branch.get', handler: handleBranchGet, options: { description: 'Get a branch by id' } },
    { method: 'branch.create', handler: handleBranchCreate, options: { description: 'Create a branch' } },
    {
      method: 'branch.history',
      handler: handleBranchHistory,
      options: { description: 'Versions of a branch, newest first, with tags' },
    },
  ];
}
