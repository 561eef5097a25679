/**
 * @fileoverview Repository exports
 */

export { BaseRepository, parseJsonColumn, isUniqueViolation } from './base.js';
export { BranchRepository } from './branch.repo.js';
export { VersionRepository } from './version.repo.js';
export { TagRepository } from './tag.repo.js';
