/**
 * Formatter exports.
 */
export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
