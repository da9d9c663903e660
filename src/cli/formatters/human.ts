/**
 * Human-readable terminal output.
 */
import chalk from 'chalk';
import { sortedVerdicts } from '../../core/validation/run.js';
import { ORPHAN_DETAILS } from '../../core/validation/markers.js';
import type { ValidationResult, VerdictResult } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'dim';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      showPassing: options.showPassing ?? false,
      showSkipped: options.showSkipped ?? false,
    };
  }

  formatResult(result: ValidationResult): string {
    const lines: string[] = [];

    for (const [uri, verdict] of sortedVerdicts(result)) {
      if (verdict.result === 'Pass' && !this.options.showPassing) {
        continue;
      }
      lines.push(`${this.getStatusIcon(verdict.result)} ${this.statusText(verdict.result)}: ${uri}`);
      if (verdict.result !== 'Pass') {
        lines.push(`   ${verdict.details}`);
      }
    }

    result.orphans.forEach((orphan, index) => {
      lines.push(`${this.getStatusIcon('Fail')} ${this.statusText('Fail')}: orphan #${index + 1}`);
      lines.push(`   ${ORPHAN_DETAILS}`);
      lines.push(`   ${this.colorize(JSON.stringify(orphan), 'dim')}`);
    });

    if (this.options.showSkipped && result.skipped.length > 0) {
      if (lines.length > 0) lines.push('');
      lines.push(this.colorize(`SKIPPED (${result.skipped.length}):`, 'blue'));
      for (const skipped of result.skipped) {
        lines.push(`   ${skipped.identifier} ${this.colorize(`(${skipped.path.join(' → ')})`, 'dim')}`);
      }
    }

    if (lines.length > 0) lines.push('');
    lines.push(this.formatSummary(result));
    return lines.join('\n');
  }

  private formatSummary(result: ValidationResult): string {
    const lines: string[] = [];
    lines.push('═'.repeat(60));

    const passedText = this.colorize(`Pass: ${result.totalPass}`, 'green');
    const failedText = this.colorize(`Fail: ${result.totalFail}`, 'red');
    const warnedText = this.colorize(`Warning: ${result.totalWarn}`, 'yellow');

    lines.push(`SUMMARY: ${passedText}, ${failedText}, ${warnedText}`);
    if (result.skipped.length > 0) {
      lines.push(`Skipped: ${result.skipped.length}`);
    }
    return lines.join('\n');
  }

  private statusText(result: VerdictResult): string {
    return this.colorize(result.toUpperCase(), this.statusColor(result));
  }

  private statusColor(result: VerdictResult): Color {
    switch (result) {
      case 'Pass':
        return 'green';
      case 'Fail':
        return 'red';
      case 'Warning':
        return 'yellow';
    }
  }

  private getStatusIcon(result: VerdictResult): string {
    switch (result) {
      case 'Pass':
        return this.colorize('✓', 'green');
      case 'Fail':
        return this.colorize('✗', 'red');
      case 'Warning':
        return this.colorize('⚠', 'yellow');
    }
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
