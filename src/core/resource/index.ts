/**
 * Resource model barrel file.
 */
export * from './types.js';
export * from './model.js';
