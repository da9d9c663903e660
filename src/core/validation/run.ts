/**
 * Validation run.
 *
 * Checks every resource of a crawl against a path set and accumulates the
 * verdicts. Synchronous and side-effect free apart from debug logging.
 */
import type { ResourceCollection } from '../resource/types.js';
import type { PathSet } from '../paths/matcher.js';
import { matchesAny } from '../paths/matcher.js';
import { traceReferencePath } from '../reachability/resolver.js';
import type { ReachabilityTrace } from '../reachability/types.js';
import { logger } from '../../utils/logger.js';
import { classify } from './classifier.js';
import type {
  ValidationResult,
  ValidationRunOptions,
  ValidationSummary,
  Verdict,
} from './types.js';

/**
 * Create an empty validation result.
 */
export function createValidationResult(): ValidationResult {
  return {
    uris: new Map(),
    orphans: [],
    skipped: [],
    totalPass: 0,
    totalFail: 0,
    totalWarn: 0,
  };
}

function count(result: ValidationResult, verdict: Verdict): void {
  switch (verdict.result) {
    case 'Pass':
      result.totalPass++;
      break;
    case 'Warning':
      result.totalWarn++;
      break;
    case 'Fail':
      result.totalFail++;
      break;
  }
}

/**
 * Validate a resource collection against a path set.
 */
export function runValidation(
  collection: ResourceCollection,
  pathSet: PathSet,
  options: ValidationRunOptions = {}
): ValidationResult {
  const log = logger.child('validate');
  const result = createValidationResult();

  for (const resource of collection) {
    const { identifier } = resource;
    const traced: { trace?: ReachabilityTrace } = {};

    const classification = classify(
      {
        identifier,
        matched: identifier !== undefined && matchesAny(identifier, pathSet),
        referencePath: () => {
          if (identifier === undefined) return [];
          traced.trace = traceReferencePath(identifier, collection, options);
          return traced.trace.path;
        },
      },
      options
    );

    switch (classification.outcome) {
      case 'orphan':
        result.orphans.push(resource.payload);
        count(result, classification.verdict);
        break;

      case 'skipped':
        if (identifier !== undefined) {
          result.skipped.push({
            identifier,
            marker: classification.marker,
            path: classification.path,
            stoppedBy: traced.trace?.stoppedBy ?? 'root',
          });
          log.debug(`Skipping ${identifier}: referenced under ${classification.marker}`, {
            path: [...classification.path],
          });
        }
        break;

      case 'verdict':
        if (identifier !== undefined) {
          const { trace } = traced;
          if (trace !== undefined && trace.stoppedBy !== 'root') {
            log.debug(`Reference path for ${identifier} is partial (${trace.stoppedBy})`, {
              path: trace.path,
              chain: trace.chain,
            });
          }
          result.uris.set(identifier, classification.verdict);
          count(result, classification.verdict);
        }
        break;
    }
  }

  return result;
}

/**
 * Derive summary counts from a validation result.
 */
export function summarize(result: ValidationResult): ValidationSummary {
  return {
    pass: result.totalPass,
    fail: result.totalFail,
    warn: result.totalWarn,
    total: result.totalPass + result.totalFail + result.totalWarn,
    orphans: result.orphans.length,
    skipped: result.skipped.length,
  };
}

/**
 * Verdicts sorted by identifier, the order reports present them in.
 */
export function sortedVerdicts(result: ValidationResult): Array<[string, Verdict]> {
  return [...result.uris.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}
