/**
 * Path matching barrel file.
 */
export * from './matcher.js';
