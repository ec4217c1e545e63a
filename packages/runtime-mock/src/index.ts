/**
 * @sightcheck/runtime-mock
 */

export * from './mock-runtime.js';
