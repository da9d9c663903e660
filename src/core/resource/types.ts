/**
 * Resource model type definitions.
 *
 * Payloads retrieved from the service are plain JSON. The validation engine
 * walks them as a tagged tree so traversal code switches on `kind` instead of
 * probing runtime types.
 */

/** A JSON scalar. */
export type JsonScalar = string | number | boolean | null;

/** Any JSON value. */
export type JsonValue = JsonScalar | JsonValue[] | JsonObject;

/** A JSON object. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/** A mapping of property names to nodes, in payload order. */
export interface MappingNode {
  kind: 'mapping';
  entries: ReadonlyArray<readonly [string, ResourceNode]>;
}

/** An ordered sequence of nodes. */
export interface SequenceNode {
  kind: 'sequence';
  items: readonly ResourceNode[];
}

/** A leaf value. */
export interface ScalarNode {
  kind: 'scalar';
  value: JsonScalar;
}

export type ResourceNode = MappingNode | SequenceNode | ScalarNode;

/**
 * One resource retrieved from the service.
 */
export interface Resource {
  /** Value of `@odata.id`, absent for orphans */
  identifier?: string;
  /** Value of `@odata.type`, if present */
  type?: string;
  /** Payload as a tagged tree */
  root: MappingNode;
  /** Payload exactly as retrieved, kept for orphan reporting */
  payload: JsonObject;
}

/** The full crawl result, in retrieval order. */
export type ResourceCollection = readonly Resource[];
