/**
 * JSON report rendering.
 */
import type { JsonObject } from '../resource/types.js';
import { sortedVerdicts } from '../validation/run.js';
import type { ValidationResult, Verdict } from '../validation/types.js';
import type { ReportContext } from './types.js';

/**
 * JSON report document.
 */
export interface JsonReport {
  tool_version?: string;
  system?: string;
  user?: string;
  openapi?: string;
  timestamp?: string;
  summary: {
    pass: number;
    fail: number;
    warn: number;
  };
  /** Verdicts keyed by identifier, keys in sorted order */
  uris: Record<string, Verdict>;
  orphans: JsonObject[];
}

/**
 * Convert a validation result into a JSON report document.
 */
export function toJsonReport(result: ValidationResult, context?: ReportContext): JsonReport {
  const uris: Record<string, Verdict> = {};
  for (const [uri, verdict] of sortedVerdicts(result)) {
    uris[uri] = { result: verdict.result, details: verdict.details };
  }

  return {
    tool_version: context?.toolVersion,
    system: context?.system,
    user: context?.user,
    openapi: context?.openapi,
    timestamp: context?.timestamp.toISOString(),
    summary: {
      pass: result.totalPass,
      fail: result.totalFail,
      warn: result.totalWarn,
    },
    uris,
    orphans: [...result.orphans],
  };
}

/**
 * Render a validation result as JSON text.
 */
export function generateJsonReport(result: ValidationResult, context?: ReportContext): string {
  return JSON.stringify(toJsonReport(result, context), null, 2) + '\n';
}
