/**
 * Reachability type definitions.
 */

/**
 * Options for the reachability resolver.
 */
export interface ReachabilityOptions {
  /** Identifiers that count as the service root */
  serviceRootPaths?: readonly string[];
  /** Properties never entered while scanning */
  skippedProperties?: readonly string[];
  /** Maximum number of upward hops */
  maxDepth?: number;
}

/**
 * Why an upward walk stopped.
 * - root: the service root was reached
 * - unreferenced: no other resource references the current target
 * - cycle: the walk came back to a target it had already visited
 * - depth: the hop limit was reached
 */
export type ReachabilityStop = 'root' | 'unreferenced' | 'cycle' | 'depth';

/**
 * Result of walking from a resource up to the service root.
 */
export interface ReachabilityTrace {
  /** Property names from the root down to the container referencing the resource */
  path: string[];
  /** Identifiers visited on the way up, starting with the resource itself */
  chain: string[];
  /** Why the walk stopped */
  stoppedBy: ReachabilityStop;
}

/**
 * A resource found to reference a target identifier.
 */
export interface ReferencingResource {
  /** Identifier of the referencing resource */
  identifier: string;
  /** Property names from that resource down to the reference */
  segments: string[];
}
