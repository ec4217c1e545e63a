/**
 * Storage barrel export.
 */

export * from './verdict-cache.js';
export * from './file-verdict-cache.js';
