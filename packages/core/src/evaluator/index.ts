/**
 * Evaluator barrel export.
 */

export * from './assertion-evaluator.js';
export * from './visual-assert.js';
