/**
 * @fileoverview Tests for TagService
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConflictError, InvalidParamsError, NotFoundError } from '../../src/errors/index.js';
import { TagId, VersionId, type Branch, type QueryVersion } from '../../src/graph/types.js';
import { VersionGraph } from '../../src/graph/version-graph.js';
import type { SqliteVersionStore } from '../../src/storage/sqlite/sqlite-store.js';
import { isStarred, STARRED_TAG_KEY } from '../../src/tags/tag.js';
import { TagService } from '../../src/tags/tag-service.js';
import { createTestStore, makeVersion } from '../fixtures.js';

describe('TagService', () => {
  let store: SqliteVersionStore;
  let graph: VersionGraph;
  let tags: TagService;
  let main: Branch;
  let version: QueryVersion;

  beforeEach(async () => {
    store = await createTestStore();
    graph = new VersionGraph(store);
    tags = new TagService(store);
    main = await graph.createBranch('main');
    version = await graph.saveVersion(makeVersion(main.id, 'SELECT 1'));
  });

  afterEach(async () => {
    await store.close();
  });

  describe('addTag', () => {
    it('should parse and store a key=value tag', async () => {
      const tag = await tags.addTag(version.id, ' env = prod ');

      expect(tag.id).toMatch(/^tag_[a-f0-9]{12}$/);
      expect(tag.versionId).toBe(version.id);
      expect(tag.tagKey).toBe('env');
      expect(tag.tagValue).toBe('prod');
    });

    it('should store a simple tag with an empty value', async () => {
      const tag = await tags.addTag(version.id, 'reviewed');
      expect(tag.tagValue).toBe('');
    });

    it('should reject an empty key', async () => {
      await expect(tags.addTag(version.id, '=value')).rejects.toBeInstanceOf(InvalidParamsError);
    });

    it('should reject an unknown version', async () => {
      await expect(tags.addTag(VersionId('qv_missing'), 'env=prod')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should return Conflict for a duplicate and keep one row', async () => {
      await tags.addTag(version.id, 'env=prod');
      await expect(tags.addTag(version.id, 'env = prod')).rejects.toBeInstanceOf(ConflictError);

      const stored = await tags.getVersionTags(version.id);
      expect(stored).toHaveLength(1);
    });

    it('should allow the same key with different values', async () => {
      await tags.addTag(version.id, 'env=prod');
      await tags.addTag(version.id, 'env=staging');
      expect(await tags.getVersionTags(version.id)).toHaveLength(2);
    });
  });

  describe('removeTag', () => {
    it('should delete an existing tag', async () => {
      const tag = await tags.addTag(version.id, 'env=prod');
      await tags.removeTag(tag.id);
      expect(await tags.getVersionTags(version.id)).toEqual([]);
    });

    it('should report NotFound for an unknown tag', async () => {
      await expect(tags.removeTag(TagId('tag_missing'))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getVersionTags', () => {
    it('should return tags oldest first', async () => {
      await tags.addTag(version.id, 'b');
      await tags.addTag(version.id, 'a');
      expect((await tags.getVersionTags(version.id)).map(t => t.tagKey)).toEqual(['b', 'a']);
    });

    it('should return an empty list for an untagged version', async () => {
      expect(await tags.getVersionTags(version.id)).toEqual([]);
    });
  });

  describe('getVersionsByTag', () => {
    it('should match key=value exactly and a bare key on any value', async () => {
      const v2 = await graph.saveVersion(makeVersion(main.id, 'SELECT 2', { parentVersionId: version.id }));
      await tags.addTag(version.id, 'env=prod');
      await tags.addTag(v2.id, 'env=staging');

      expect((await tags.getVersionsByTag(main.id, 'env=prod')).map(v => v.id)).toEqual([version.id]);
      expect((await tags.getVersionsByTag(main.id, 'env')).map(v => v.id)).toEqual([v2.id, version.id]);
      expect(await tags.getVersionsByTag(main.id, 'env=dev')).toEqual([]);
    });

    it('should scope results to the branch', async () => {
      const other = await graph.createBranch('other');
      const otherVersion = await graph.saveVersion(makeVersion(other.id, 'SELECT 1'));
      await tags.addTag(otherVersion.id, 'env=prod');

      expect(await tags.getVersionsByTag(main.id, 'env=prod')).toEqual([]);
    });
  });

  describe('toggleStar', () => {
    it('should star then unstar', async () => {
      expect(await tags.toggleStar(version.id)).toBe(true);
      expect((await tags.getVersionTags(version.id)).map(t => t.tagKey)).toEqual([STARRED_TAG_KEY]);

      expect(await tags.toggleStar(version.id)).toBe(false);
      expect((await tags.getVersionTags(version.id)).some(t => t.tagKey === STARRED_TAG_KEY)).toBe(false);
    });

    it('should leave other tags alone', async () => {
      await tags.addTag(version.id, 'env=prod');
      await tags.toggleStar(version.id);
      await tags.toggleStar(version.id);
      expect((await tags.getVersionTags(version.id)).map(t => t.tagKey)).toEqual(['env']);
    });

    it('should unstar a star tag that carries a value', async () => {
      await tags.addTag(version.id, 'system:starred=yes');
      expect(isStarred(await tags.getVersionTags(version.id))).toBe(true);

      expect(await tags.toggleStar(version.id)).toBe(false);
      expect(await tags.getVersionTags(version.id)).toEqual([]);
    });

    it('should reject an unknown version', async () => {
      await expect(tags.toggleStar(VersionId('qv_missing'))).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
