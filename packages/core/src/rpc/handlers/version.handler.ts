/**
 * @fileoverview Version RPC Handlers
 */

import { NotFoundError } from '../../errors/index.js';
import type { MethodHandler, MethodRegistration } from '../registry.js';
import { versionByTagSchema, versionGetSchema } from '../schemas.js';
import { parseParams } from '../validation.js';

export const handleVersionGet: MethodHandler = async (request, context) => {
  const { versionId } = parseParams(versionGetSchema, request.params);
  const version = await context.graph.getVersion(versionId);
  if (!version) {
    throw new NotFoundError('version', versionId);
  }
  return version;
};

export const handleVersionByTag: MethodHandler = async (request, context) => {
  const { branchId, tag } = parseParams(versionByTagSchema, request.params);
  return context.tags.getVersionsByTag(branchId, tag);
};

export function createVersionHandlers(): MethodRegistration[] {
  return [
    { method: 'version.get', handler: handleVersionGet, options: { description: 'Get a version by id' } },
    {
      method: 'version.byTag',
      handler: handleVersionByTag,
      options: { description: 'Versions of a branch carrying a tag' },
    },
  ];
}
