/**
 * Breadth-first crawl of every resource linked from the service root.
 */
import { logger } from '../../utils/logger.js';
import { createResource, isJsonObject, ODATA_ID } from '../resource/model.js';
import type { JsonObject, JsonValue, Resource } from '../resource/types.js';
import type { CrawlOptions, RedfishSession, ResourceCrawler } from './types.js';

/** Links to documents that are not resources. */
const NON_RESOURCE_MARKERS = ['$metadata'];

/**
 * Drop the fragment of a link; `/redfish/v1/Chassis/1#/Oem` names the same
 * resource as `/redfish/v1/Chassis/1`.
 */
export function normalizeLink(link: string): string {
  const hash = link.indexOf('#');
  return hash === -1 ? link : link.slice(0, hash);
}

/**
 * Deduplication key for a link: fragment and trailing slashes dropped, so
 * `/redfish/v1/` and `/redfish/v1` are retrieved once.
 */
export function linkKey(link: string): string {
  return normalizeLink(link).replace(/\/+$/, '') || '/';
}

/**
 * Collect every `@odata.id` string in a payload, in depth-first order.
 * Relationship properties such as `Links` are included; the crawl must reach
 * everything the service exposes.
 */
export function collectLinks(payload: JsonObject): string[] {
  const links: string[] = [];
  const stack: JsonValue[] = [payload];

  while (stack.length > 0) {
    const value = stack.pop();
    if (Array.isArray(value)) {
      for (let i = value.length - 1; i >= 0; i--) stack.push(value[i]);
    } else if (isJsonObject(value)) {
      const entries = Object.entries(value);
      for (let i = entries.length - 1; i >= 0; i--) {
        const [name, child] = entries[i];
        if (name === ODATA_ID) {
          if (typeof child === 'string') links.push(child);
        } else {
          stack.push(child);
        }
      }
    }
  }

  return links;
}

/**
 * Crawler over a Redfish session.
 */
export class RedfishCrawler implements ResourceCrawler {
  constructor(
    private readonly session: RedfishSession,
    private readonly options: CrawlOptions
  ) {}

  async crawl(): Promise<Resource[]> {
    await this.session.login();
    try {
      return await this.walk();
    } finally {
      await this.session.logout();
    }
  }

  private isFollowable(link: string): boolean {
    const root = this.options.serviceRoot.replace(/\/+$/, '');
    if (link !== root && !link.startsWith(`${root}/`)) {
      return false;
    }
    return !NON_RESOURCE_MARKERS.some((marker) => link.includes(marker));
  }

  private async walk(): Promise<Resource[]> {
    const log = logger.child('crawl');
    const root = this.options.serviceRoot;
    const queue: string[] = [root];
    const seen = new Set<string>([linkKey(root)]);
    const resources: Resource[] = [];

    while (queue.length > 0 && resources.length < this.options.maxResources) {
      const uri = queue.shift();
      if (uri === undefined) break;

      let payload: JsonObject;
      try {
        payload = await this.session.get(uri);
      } catch (error) {
        if (uri === root) {
          throw error;
        }
        log.warn(error instanceof Error ? error.message : `GET ${uri} failed`);
        continue;
      }

      const resource = createResource(payload);
      resources.push(resource);
      if (resource.identifier !== undefined) {
        seen.add(linkKey(resource.identifier));
      }
      log.debug(`Retrieved ${uri}`);
      if (resources.length % 100 === 0) {
        log.info(`Retrieved ${resources.length} resources...`);
      }

      for (const link of collectLinks(payload)) {
        const next = normalizeLink(link);
        const key = linkKey(next);
        if (!seen.has(key) && this.isFollowable(next)) {
          seen.add(key);
          queue.push(next);
        }
      }
    }

    if (queue.length > 0) {
      log.warn(`Stopped after ${this.options.maxResources} resources; ${queue.length} left unvisited`);
    }

    return resources;
  }
}
