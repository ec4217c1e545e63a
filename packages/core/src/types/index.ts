/**
 * Types barrel export.
 */

export * from './common.js';
export * from './errors.js';
export * from './capture.js';
export * from './query.js';
export * from './verdict.js';
export * from './runtime.js';
export * from './config.js';
