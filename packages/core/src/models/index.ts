/**
 * Models barrel export.
 */

export * from './model-file.js';
export * from './model-registry.js';
export * from './model-session.js';
