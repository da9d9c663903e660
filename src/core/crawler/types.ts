/**
 * Crawler type definitions.
 */
import type { AuthMode } from '../config/schema.js';
import type { JsonObject, Resource } from '../resource/types.js';

/**
 * Connection settings for a Redfish service.
 */
export interface RedfishClientConfig {
  /** Scheme and host of the service, e.g. https://192.0.2.10 */
  baseUrl: string;
  username: string;
  password: string;
  auth: AuthMode;
  /** Per-request timeout */
  timeoutMs: number;
  /** Service root path */
  serviceRoot: string;
}

/**
 * An authenticated connection able to retrieve resources.
 */
export interface RedfishSession {
  login(): Promise<void>;
  get(uri: string): Promise<JsonObject>;
  logout(): Promise<void>;
}

/**
 * Options for a crawl.
 */
export interface CrawlOptions {
  /** Service root path the crawl starts from */
  serviceRoot: string;
  /** Stop after this many resources */
  maxResources: number;
}

/**
 * Produces the full resource collection of a service.
 */
export interface ResourceCrawler {
  crawl(): Promise<Resource[]>;
}
