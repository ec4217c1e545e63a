/**
 * @sightcheck/runtime-ollama
 */

export * from './ollama-runtime.js';
