/**
 * Report type definitions.
 */
import type { ReportFormat } from '../config/schema.js';

/**
 * Everything a report shows besides the validation result itself.
 * Passed in explicitly by the caller.
 */
export interface ReportContext {
  /** Report heading */
  title: string;
  /** Version of this tool */
  toolVersion: string;
  /** Image data URI for the header, or null for none */
  logo: string | null;
  /** Service that was validated, or the saved crawl it was read from */
  system: string;
  /** User the service was accessed as */
  user?: string;
  /** OpenAPI document the paths came from */
  openapi: string;
  /** When the run finished */
  timestamp: Date;
}

/**
 * Options for writing report files.
 */
export interface WriteReportOptions {
  formats: readonly ReportFormat[];
  /** Output directory; the working directory when null or undefined */
  logdir?: string | null;
}
