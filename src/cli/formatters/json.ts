/**
 * JSON terminal output for machine consumption.
 */
import type { ValidationResult } from '../../core/validation/types.js';
import { toJsonReport } from '../../core/report/json.js';
import type { IFormatter, FormatOptions } from './types.js';

export class JsonFormatter implements IFormatter {
  private showSkipped: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.showSkipped = options.showSkipped ?? false;
  }

  formatResult(result: ValidationResult): string {
    const output: Record<string, unknown> = { ...toJsonReport(result) };
    if (this.showSkipped) {
      output.skipped = result.skipped.map((s) => ({
        identifier: s.identifier,
        marker: s.marker,
        path: s.path,
      }));
    }
    return JSON.stringify(output, null, 2);
  }
}
