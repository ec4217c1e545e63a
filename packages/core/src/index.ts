/**
 * @sightcheck/core
 * Main entry point.
 */

export * from './types/index.js';
export * from './utils/index.js';
export * from './models/index.js';
export * from './storage/index.js';
export * from './capture/index.js';
export * from './interpreters/index.js';
export { answerSpecSchema } from './interpreters/answer-schema.js';
export * from './evaluator/index.js';
export * from './suite/index.js';
