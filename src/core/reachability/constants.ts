/**
 * Property names and paths the reachability resolver treats specially.
 */

/** Identifiers that end an upward walk. */
export const SERVICE_ROOT_PATHS: readonly string[] = ['/redfish/v1/', '/redfish/v1'];

/**
 * Properties holding relationship data rather than subordinate resources.
 * A reference found under one of these does not show ownership, so they are
 * never entered while scanning.
 */
export const SKIPPED_PROPERTIES: readonly string[] = [
  'Links',
  'PoweredBy',
  'CooledBy',
  'RelatedItem',
  'OriginOfCondition',
  'MaintenanceWindowResource',
  'RedundancySet',
  'OriginResources',
];

/** Upper bound on upward hops from a resource to the service root. */
export const DEFAULT_MAX_REFERENCE_DEPTH = 64;
