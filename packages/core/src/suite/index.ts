export * from './suite-schema.js';
export * from './suite-runner.js';
export * from './report.js';
