/**
 * Reachability resolver barrel file.
 */
export * from './constants.js';
export * from './types.js';
export * from './resolver.js';
