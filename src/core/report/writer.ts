/**
 * Report file output.
 */
import * as path from 'node:path';
import { writeFile } from '../../utils/file-system.js';
import type { ReportFormat } from '../config/schema.js';
import type { ValidationResult } from '../validation/types.js';
import { generateHtmlReport } from './html.js';
import { generateJsonReport } from './json.js';
import type { ReportContext, WriteReportOptions } from './types.js';

const REPORT_PREFIX = 'RedfishURITestReport';

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Report file name for a run, e.g. `RedfishURITestReport_10_19_2026_084800.html`.
 * Uses local time.
 */
export function reportFileName(date: Date, format: ReportFormat = 'html'): string {
  const day = `${pad(date.getMonth() + 1)}_${pad(date.getDate())}_${date.getFullYear()}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${REPORT_PREFIX}_${day}_${time}.${format}`;
}

function render(format: ReportFormat, result: ValidationResult, context: ReportContext): string {
  switch (format) {
    case 'html':
      return generateHtmlReport(result, context);
    case 'json':
      return generateJsonReport(result, context);
  }
}

/**
 * Write one report file per requested format.
 * @returns Paths written, in format order
 */
export async function writeReports(
  result: ValidationResult,
  context: ReportContext,
  options: WriteReportOptions
): Promise<string[]> {
  const written: string[] = [];
  for (const format of new Set(options.formats)) {
    const fileName = reportFileName(context.timestamp, format);
    const filePath = options.logdir ? path.join(options.logdir, fileName) : fileName;
    await writeFile(filePath, render(format, result, context));
    written.push(filePath);
  }
  return written;
}
