/**
 * Names the classifier looks for in a reachability path.
 */

/**
 * Annotations whose subordinate resources are not expected to be declared in
 * the OpenAPI document.
 */
export const EXCEPTION_MARKERS: readonly string[] = [
  '@Redfish.Settings',
  '@Redfish.ActionInfo',
  '@Redfish.CollectionCapabilities',
];

/** Property under which vendor extensions live. */
export const OEM_PROPERTY = 'Oem';

/** Details recorded for a resource without an identifier. */
export const ORPHAN_DETAILS = 'Missing "@odata.id" and/or "@odata.type" from the payload';

/** Details recorded for a passing identifier. */
export const PASS_DETAILS = 'Pass';

export function oemNotFoundDetails(identifier: string): string {
  return `OEM resource '${identifier}' was not found in the OpenAPI specification`;
}

export function notFoundDetails(identifier: string): string {
  return `Resource '${identifier}' was not found in the OpenAPI specification`;
}
