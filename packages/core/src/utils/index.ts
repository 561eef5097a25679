/**
 * @fileoverview Utils Module
 */

export * from './ids.js';
export * from './mask.js';
