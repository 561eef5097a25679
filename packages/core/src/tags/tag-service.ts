/**
 * @fileoverview Tag operations over a version store
 *
 * Tags are unique per (version, key, value). `toggleStar` is a plain
 * read-then-act sequence with no lock; under concurrent toggles the unique
 * index is the backstop, and the returned flag is the state this call
 * believes it produced.
 */

import { ConflictError, InvalidParamsError, NotFoundError } from '../errors/index.js';
import { newTagId, type BranchId, type QueryVersion, type TagId, type VersionId, type VersionTag } from '../graph/types.js';
import { createLogger } from '../logging/index.js';
import type { VersionStore } from '../storage/types.js';
import { nowIso } from '../utils/ids.js';
import { formatTag, parseTag, STARRED_TAG_KEY } from './tag.js';

const logger = createLogger('tags');

export class TagService {
  constructor(private readonly store: VersionStore) {}

  /**
   * Parse `rawTag` (`key` or `key=value`) and attach it to the version
   */
  async addTag(versionId: VersionId, rawTag: string): Promise<VersionTag> {
    const { key, value } = parseTag(rawTag);
    if (key === '') {
      throw new InvalidParamsError('Tag key must not be empty');
    }
    await this.requireVersion(versionId);

    const existing = await this.store.findTag(versionId, key, value);
    if (existing) {
      throw new ConflictError(`Tag already exists on version ${versionId}: ${formatTag(key, value)}`);
    }

    const tag: VersionTag = {
      id: newTagId(),
      versionId,
      tagKey: key,
      tagValue: value,
      createdAt: nowIso(),
    };
    await this.store.insertTag(tag);
    logger.debug('Tag added', { versionId, tag: formatTag(key, value) });
    return tag;
  }

  async removeTag(tagId: TagId): Promise<void> {
    const removed = await this.store.deleteTag(tagId);
    if (!removed) {
      throw new NotFoundError('tag', tagId);
    }
  }

  /**
   * Tags of a version, oldest first
   */
  getVersionTags(versionId: VersionId): Promise<VersionTag[]> {
    return this.store.getTagsForVersion(versionId);
  }

  /**
   * Versions of a branch carrying the tag, newest first. A bare `key`
   * matches any value; `key=value` matches exactly.
   */
  getVersionsByTag(branchId: BranchId, rawTag: string): Promise<QueryVersion[]> {
    const { key, value } = parseTag(rawTag);
    if (key === '') {
      throw new InvalidParamsError('Tag key must not be empty');
    }
    return this.store.listVersionsByTag(branchId, {
      key,
      value: rawTag.includes('=') ? value : null,
    });
  }

  /**
   * Star or unstar a version. Any `system:starred` tag counts as a star,
   * whatever its value.
   * @returns true when the version is now starred
   */
  async toggleStar(versionId: VersionId): Promise<boolean> {
    const tags = await this.store.getTagsForVersion(versionId);
    const star = tags.find(tag => tag.tagKey === STARRED_TAG_KEY);
    if (star) {
      await this.removeTag(star.id);
      return false;
    }
    await this.addTag(versionId, STARRED_TAG_KEY);
    return true;
  }

  private async requireVersion(versionId: VersionId): Promise<void> {
    const version = await this.store.getVersion(versionId);
    if (!version) {
      throw new NotFoundError('version', versionId);
    }
  }
}
