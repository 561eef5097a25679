/**
 * @fileoverview Tag RPC Handlers
 */

import type { MethodHandler, MethodRegistration } from '../registry.js';
import { tagAddSchema, tagListSchema, tagRemoveSchema, tagToggleStarSchema } from '../schemas.js';
import { parseParams } from '../validation.js';

export const handleTagList: MethodHandler = async (request, context) => {
  const { versionId } = parseParams(tagListSchema, request.params);
  return context.tags.getVersionTags(versionId);
};

export const handleTagAdd: MethodHandler = async (request, context) => {
  const { versionId, tag } = parseParams(tagAddSchema, request.params);
  return context.tags.addTag(versionId, tag);
};

export const handleTagRemove: MethodHandler = async (request, context) => {
  const { tagId } = parseParams(tagRemoveSchema, request.params);
  await context.tags.removeTag(tagId);
  return { removed: true };
};

export const handleTagToggleStar: MethodHandler = async (request, context) => {
  const { versionId } = parseParams(tagToggleStarSchema, request.params);
  return { starred: await context.tags.toggleStar(versionId) };
};

export function createTagHandlers(): MethodRegistration[] {
  return [
    { method: 'tag.list', handler: handleTagList, options: { description: 'Tags of a version' } },
    { method: 'tag.add', handler: handleTagAdd, options: { description: 'Attach a tag to a version' } },
    { method: 'tag.remove', handler: handleTagRemove, options: { description: 'Remove a tag by id' } },
    {
      method: 'tag.toggleStar',
      handler: handleTagToggleStar,
      options: { description: 'Star or unstar a version' },
    },
  ];
}
