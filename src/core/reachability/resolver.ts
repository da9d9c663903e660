/**
 * Reachability resolver.
 *
 * When a resource's identifier matches no template, the resolver finds how the
 * service reaches it: which resource embeds a reference to it, under which
 * properties, and so on up to the service root. The resulting property path is
 * what the classifier inspects for exception markers.
 *
 * The first reference found wins. Resources are searched in collection order
 * and each payload depth-first in property order.
 */
import type { MappingNode, ResourceCollection, ResourceNode } from '../resource/types.js';
import { ODATA_ID } from '../resource/model.js';
import {
  DEFAULT_MAX_REFERENCE_DEPTH,
  SERVICE_ROOT_PATHS,
  SKIPPED_PROPERTIES,
} from './constants.js';
import type {
  ReachabilityOptions,
  ReachabilityTrace,
  ReferencingResource,
} from './types.js';

type ScanTask =
  | { kind: 'mapping'; node: MappingNode; chain: string[] }
  | { kind: 'entry'; name: string; node: ResourceNode; chain: string[] };

/**
 * Scan a payload for an embedded reference to `target`.
 *
 * Returns the property names leading to the mapping whose `@odata.id` equals
 * the target, or undefined when there is none. Sequences contribute their
 * property name once; only mapping items are entered.
 */
export function scanObject(
  target: string,
  mapping: MappingNode,
  skippedProperties: ReadonlySet<string> = new Set(SKIPPED_PROPERTIES)
): string[] | undefined {
  const stack: ScanTask[] = [{ kind: 'mapping', node: mapping, chain: [] }];

  while (stack.length > 0) {
    const task = stack.pop();
    if (task === undefined) break;

    if (task.kind === 'mapping') {
      // Reverse push so entries pop in payload order
      for (let i = task.node.entries.length - 1; i >= 0; i--) {
        const [name, node] = task.node.entries[i];
        stack.push({ kind: 'entry', name, node, chain: task.chain });
      }
      continue;
    }

    const { name, node, chain } = task;
    if (name === ODATA_ID && node.kind === 'scalar' && node.value === target) {
      return chain;
    }
    if (skippedProperties.has(name)) {
      continue;
    }

    switch (node.kind) {
      case 'mapping':
        stack.push({ kind: 'mapping', node, chain: [...chain, name] });
        break;
      case 'sequence': {
        const itemChain = [...chain, name];
        for (let i = node.items.length - 1; i >= 0; i--) {
          const item = node.items[i];
          if (item.kind === 'mapping') {
            stack.push({ kind: 'mapping', node: item, chain: itemChain });
          }
        }
        break;
      }
      case 'scalar':
        break;
    }
  }

  return undefined;
}

/**
 * Find the first resource, other than the target itself, that embeds a
 * reference to `target`.
 */
export function findReferencingResource(
  target: string,
  collection: ResourceCollection,
  skippedProperties: ReadonlySet<string> = new Set(SKIPPED_PROPERTIES)
): ReferencingResource | undefined {
  for (const resource of collection) {
    if (resource.identifier === undefined || resource.identifier === target) {
      continue;
    }
    const segments = scanObject(target, resource.root, skippedProperties);
    if (segments !== undefined) {
      return { identifier: resource.identifier, segments };
    }
  }
  return undefined;
}

/**
 * Walk from `target` up to the service root, collecting the property path.
 *
 * The walk stops at the root, at a target nothing references, at a target
 * already visited, or after `maxDepth` hops. In every case the path built so
 * far is returned.
 */
export function traceReferencePath(
  target: string,
  collection: ResourceCollection,
  options: ReachabilityOptions = {}
): ReachabilityTrace {
  const roots = new Set(options.serviceRootPaths ?? SERVICE_ROOT_PATHS);
  const skipped = new Set(options.skippedProperties ?? SKIPPED_PROPERTIES);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_REFERENCE_DEPTH;

  const visited = new Set<string>();
  const chain: string[] = [target];
  let path: string[] = [];
  let current = target;

  while (!roots.has(current)) {
    if (visited.size >= maxDepth) {
      return { path, chain, stoppedBy: 'depth' };
    }
    visited.add(current);

    const referencing = findReferencingResource(current, collection, skipped);
    if (referencing === undefined) {
      return { path, chain, stoppedBy: 'unreferenced' };
    }

    path = [...referencing.segments, ...path];
    current = referencing.identifier;
    if (visited.has(current)) {
      return { path, chain, stoppedBy: 'cycle' };
    }
    chain.push(current);
  }

  return { path, chain, stoppedBy: 'root' };
}

/**
 * Build the property path from the service root to the container that
 * references `target`.
 */
export function buildReferencePath(
  target: string,
  collection: ResourceCollection,
  options: ReachabilityOptions = {}
): string[] {
  return traceReferencePath(target, collection, options).path;
}
