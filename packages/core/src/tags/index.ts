/**
 * @fileoverview Tag system exports
 */

export {
  SYSTEM_TAG_PREFIX,
  STARRED_TAG_KEY,
  parseTag,
  formatTag,
  normalizeTag,
  isSystemTag,
  isStarred,
  type ParsedTag,
} from './tag.js';
export { TagService } from './tag-service.js';
