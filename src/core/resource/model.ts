/**
 * Conversion from parsed JSON payloads to resources.
 */
import type {
  JsonObject,
  JsonValue,
  MappingNode,
  Resource,
  ResourceNode,
} from './types.js';

/** Property holding a resource's addressable path. */
export const ODATA_ID = '@odata.id';

/** Property holding a resource's type tag. */
export const ODATA_TYPE = '@odata.type';

/**
 * Check whether a JSON value is an object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check whether an unknown value is a JSON value.
 * Rejects functions, symbols, bigints, undefined and non-finite numbers.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) {
        return true;
      }
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Convert a JSON value into a tagged resource node.
 */
export function toResourceNode(value: JsonValue): ResourceNode {
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value.map(toResourceNode) };
  }
  if (isJsonObject(value)) {
    return toMappingNode(value);
  }
  return { kind: 'scalar', value };
}

/**
 * Convert a JSON object into a mapping node, keeping property order.
 */
export function toMappingNode(value: JsonObject): MappingNode {
  return {
    kind: 'mapping',
    entries: Object.entries(value).map(([name, child]) => [name, toResourceNode(child)] as const),
  };
}

/**
 * Build a resource from a retrieved payload.
 * A non-string `@odata.id` counts as absent.
 */
export function createResource(payload: JsonObject): Resource {
  const id = payload[ODATA_ID];
  const type = payload[ODATA_TYPE];
  return {
    identifier: typeof id === 'string' ? id : undefined,
    type: typeof type === 'string' ? type : undefined,
    root: toMappingNode(payload),
    payload,
  };
}

/**
 * Build a resource collection from retrieved payloads, keeping their order.
 */
export function createResourceCollection(payloads: readonly JsonObject[]): Resource[] {
  return payloads.map(createResource);
}
