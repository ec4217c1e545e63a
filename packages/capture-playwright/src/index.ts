/**
 * @sightcheck/capture-playwright
 */

export * from './playwright-capture.js';
export * from './browser.js';
