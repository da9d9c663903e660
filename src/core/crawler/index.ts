/**
 * Crawler barrel file.
 */
export * from './types.js';
export * from './client.js';
export * from './crawler.js';
export * from './dump.js';
