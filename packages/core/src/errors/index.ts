/**
 * @fileoverview Error exports
 */

export * from './errors.js';
