/**
 * @fileoverview Tag string parsing and classification
 *
 * The wire format for a tag is `key` or `key=value`. Keys under the
 * `system:` prefix are reserved for built-in features such as starring;
 * the prefix is a naming convention only, not an access check.
 */

export const SYSTEM_TAG_PREFIX = 'system:';
export const STARRED_TAG_KEY = `${SYSTEM_TAG_PREFIX}starred`;

export interface ParsedTag {
  key: string;
  value: string;
}

/**
 * Split on the first `=` and trim both sides. Total: every string parses.
 */
export function parseTag(raw: string): ParsedTag {
  const separator = raw.indexOf('=');
  if (separator === -1) {
    return { key: raw.trim(), value: '' };
  }
  return {
    key: raw.slice(0, separator).trim(),
    value: raw.slice(separator + 1).trim(),
  };
}

export function formatTag(key: string, value: string): string {
  return value === '' ? key : `${key}=${value}`;
}

/**
 * Normalize a raw tag string (parse then format)
 */
export function normalizeTag(raw: string): string {
  const { key, value } = parseTag(raw);
  return formatTag(key, value);
}

export function isSystemTag(key: string): boolean {
  return key.startsWith(SYSTEM_TAG_PREFIX);
}

export function isStarred(tags: ReadonlyArray<{ tagKey: string }>): boolean {
  return tags.some(tag => tag.tagKey === STARRED_TAG_KEY);
}
