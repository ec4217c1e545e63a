export * from './capture-record.js';
export * from './file-capture.js';
export * from './frames.js';
