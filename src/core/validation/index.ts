/**
 * Validation engine barrel file.
 */
export * from './types.js';
export * from './markers.js';
export * from './classifier.js';
export * from './run.js';
