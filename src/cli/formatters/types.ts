/**
 * Formatter type definitions.
 */
import type { ValidationResult } from '../../core/validation/types.js';

/**
 * Terminal output format options.
 */
export type OutputFormat = 'human' | 'json';

/**
 * Options for terminal output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Show passing identifiers (default: false - only warnings and failures) */
  showPassing: boolean;
  /** List resources skipped as expected exceptions */
  showSkipped: boolean;
}

/**
 * Interface for terminal output formatters.
 */
export interface IFormatter {
  formatResult(result: ValidationResult): string;
}
