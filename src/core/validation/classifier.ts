/**
 * Verdict classification for one resource.
 */
import {
  EXCEPTION_MARKERS,
  OEM_PROPERTY,
  ORPHAN_DETAILS,
  PASS_DETAILS,
  notFoundDetails,
  oemNotFoundDetails,
} from './markers.js';
import type { Classification, ClassifierInput, ClassifierOptions } from './types.js';

/**
 * Find the first exception marker present in a reachability path.
 */
export function findExceptionMarker(
  path: readonly string[],
  options: ClassifierOptions = {}
): string | undefined {
  const markers = [...EXCEPTION_MARKERS, ...(options.extraExceptionMarkers ?? [])];
  if (options.strictMarkers) {
    const parent = path[path.length - 1];
    return markers.find((marker) => marker === parent);
  }
  return markers.find((marker) => path.includes(marker));
}

/**
 * Classify one resource.
 *
 * | Condition                            | Outcome        |
 * |--------------------------------------|----------------|
 * | no identifier                        | orphan (Fail)  |
 * | template match                       | Pass           |
 * | exception marker in reference path   | skipped        |
 * | `Oem` in reference path              | Warning        |
 * | otherwise                            | Fail           |
 *
 * The reference path is only built when no template matched.
 */
export function classify(input: ClassifierInput, options: ClassifierOptions = {}): Classification {
  const { identifier } = input;

  if (identifier === undefined) {
    return { outcome: 'orphan', verdict: { result: 'Fail', details: ORPHAN_DETAILS } };
  }

  if (input.matched) {
    return { outcome: 'verdict', verdict: { result: 'Pass', details: PASS_DETAILS } };
  }

  const path = input.referencePath();
  const marker = findExceptionMarker(path, options);
  if (marker !== undefined) {
    return { outcome: 'skipped', marker, path };
  }

  if (path.includes(OEM_PROPERTY)) {
    return {
      outcome: 'verdict',
      verdict: { result: 'Warning', details: oemNotFoundDetails(identifier) },
    };
  }

  return {
    outcome: 'verdict',
    verdict: { result: 'Fail', details: notFoundDetails(identifier) },
  };
}
