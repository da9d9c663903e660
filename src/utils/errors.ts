/**
 * Error types and codes for redfish-uri-check.
 * All errors raised by the tool extend RedfishCheckError.
 */

/**
 * Base error class for all redfish-uri-check errors.
 */
export class RedfishCheckError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RedfishCheckError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends RedfishCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * OpenAPI document errors (cannot read, cannot parse, no paths).
 */
export class OpenApiError extends RedfishCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'OpenApiError';
  }
}

/**
 * A path template that cannot be compiled into a matcher.
 * Raised while the path set is built, before any resource is checked.
 */
export class MalformedTemplateError extends RedfishCheckError {
  constructor(
    public readonly template: string,
    reason: string
  ) {
    super(ErrorCodes.MALFORMED_TEMPLATE, `Malformed path template '${template}': ${reason}`, {
      template,
      reason,
    });
    this.name = 'MalformedTemplateError';
  }
}

/**
 * Errors talking to the Redfish service (login, retrieval).
 */
export class CrawlError extends RedfishCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'CrawlError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends RedfishCheckError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  CONFIG_MISSING_OPTION: 'CONFIG_MISSING_OPTION',

  // OpenAPI document
  OPENAPI_READ_ERROR: 'OPENAPI_READ_ERROR',
  OPENAPI_PARSE_ERROR: 'OPENAPI_PARSE_ERROR',
  OPENAPI_MISSING_PATHS: 'OPENAPI_MISSING_PATHS',
  MALFORMED_TEMPLATE: 'PATH_MALFORMED_TEMPLATE',

  // Service crawl
  LOGIN_FAILED: 'CRAWL_LOGIN_FAILED',
  REQUEST_FAILED: 'CRAWL_REQUEST_FAILED',
  INVALID_PAYLOAD: 'CRAWL_INVALID_PAYLOAD',

  // System
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
  INVALID_DUMP: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
