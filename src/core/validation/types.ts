/**
 * Validation type definitions.
 */
import type { JsonObject } from '../resource/types.js';
import type { ReachabilityOptions, ReachabilityStop } from '../reachability/types.js';

/** Verdict outcome for one identifier. */
export type VerdictResult = 'Pass' | 'Fail' | 'Warning';

/**
 * Verdict for one identifier.
 */
export interface Verdict {
  result: VerdictResult;
  /** "Pass" for passing identifiers, otherwise the cause */
  details: string;
}

/**
 * Classifier outcome.
 * - orphan: the resource has no identifier; counted as Fail
 * - verdict: the identifier gets a recorded verdict
 * - skipped: an expected exception; not recorded and not counted
 */
export type Classification =
  | { outcome: 'orphan'; verdict: Verdict }
  | { outcome: 'verdict'; verdict: Verdict }
  | { outcome: 'skipped'; marker: string; path: readonly string[] };

/**
 * Input to the classifier for one resource.
 */
export interface ClassifierInput {
  /** Resource identifier, undefined for orphans */
  identifier: string | undefined;
  /** Whether a template matched the identifier */
  matched: boolean;
  /** Builds the reachability path; only called when nothing matched */
  referencePath: () => readonly string[];
}

/**
 * Classifier options.
 */
export interface ClassifierOptions {
  /** Additional exception markers on top of the built-in ones */
  extraExceptionMarkers?: readonly string[];
  /**
   * Only honour an exception marker when it is the last path segment, i.e.
   * the property directly holding the reference. Off by default: a marker
   * anywhere along the path excuses the resource.
   */
  strictMarkers?: boolean;
}

/**
 * Options for a validation run.
 */
export interface ValidationRunOptions extends ClassifierOptions, ReachabilityOptions {}

/**
 * A resource excluded from the result as an expected exception.
 */
export interface SkippedResource {
  identifier: string;
  /** Exception marker found in the path */
  marker: string;
  /** Reachability path that contained the marker */
  path: readonly string[];
  /** Why the upward walk stopped */
  stoppedBy: ReachabilityStop;
}

/**
 * Result of a validation run.
 * totalPass + totalFail + totalWarn equals the number of classified
 * resources plus the number of orphans.
 */
export interface ValidationResult {
  /** Verdict per identifier */
  uris: Map<string, Verdict>;
  /** Payloads without an identifier, in encounter order */
  orphans: JsonObject[];
  /** Resources excluded as expected exceptions */
  skipped: SkippedResource[];
  totalPass: number;
  totalFail: number;
  totalWarn: number;
}

/**
 * Counts derived from a validation result.
 */
export interface ValidationSummary {
  pass: number;
  fail: number;
  warn: number;
  /** pass + fail + warn */
  total: number;
  orphans: number;
  skipped: number;
}
