/**
 * Utils barrel export.
 */

export * from './clock.js';
export * from './config-validator.js';
export * from './hashing.js';
export * from './mutex.js';
export * from './retry-controller.js';
