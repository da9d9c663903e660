/**
 * redfish-uri-check - verify Redfish resource URIs against an OpenAPI document.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Resource model
export * from './core/resource/index.js';

// Path matching
export * from './core/paths/index.js';

// Reachability
export * from './core/reachability/index.js';

// Validation
export * from './core/validation/index.js';

// OpenAPI document loading
export * from './core/openapi/index.js';

// Service crawl
export * from './core/crawler/index.js';

// Reports
export * from './core/report/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
