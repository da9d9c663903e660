/**
 * HTTP client for a Redfish service.
 *
 * Session authentication posts credentials to the session collection and
 * sends the returned X-Auth-Token on every request; basic authentication
 * sends the credentials instead.
 */
import { CrawlError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isJsonObject, isJsonValue } from '../resource/model.js';
import type { JsonObject } from '../resource/types.js';
import type { RedfishClientConfig, RedfishSession } from './types.js';

const SESSIONS_PATH = 'SessionService/Sessions';

/** A response with its body already read. */
interface HttpReply {
  ok: boolean;
  status: number;
  headers: Headers;
  body: string;
}

/**
 * Redfish service client.
 */
export class RedfishClient implements RedfishSession {
  private readonly config: RedfishClientConfig;
  private token: string | undefined;
  private sessionUri: string | undefined;

  constructor(config: RedfishClientConfig) {
    this.config = config;
  }

  /** Whether a session token is held. */
  hasSession(): boolean {
    return this.token !== undefined;
  }

  async login(): Promise<void> {
    if (this.config.auth === 'basic') {
      return;
    }

    const uri = joinServicePath(this.config.serviceRoot, SESSIONS_PATH);
    let response: HttpReply;
    try {
      response = await this.request('POST', uri, {
        UserName: this.config.username,
        Password: this.config.password,
      });
    } catch (error) {
      throw new CrawlError(
        ErrorCodes.LOGIN_FAILED,
        `Could not log into ${this.config.baseUrl}: ${error instanceof Error ? error.message : String(error)}`,
        { baseUrl: this.config.baseUrl, username: this.config.username }
      );
    }

    const token = response.headers.get('X-Auth-Token');
    if (!response.ok || token === null) {
      throw new CrawlError(
        ErrorCodes.LOGIN_FAILED,
        `Could not log into ${this.config.baseUrl} as '${this.config.username}': HTTP ${response.status}`,
        { baseUrl: this.config.baseUrl, username: this.config.username, status: response.status }
      );
    }

    this.token = token;
    const location = response.headers.get('Location');
    this.sessionUri = location === null ? undefined : new URL(location, this.config.baseUrl).toString();
  }

  async get(uri: string): Promise<JsonObject> {
    let response: HttpReply;
    try {
      response = await this.request('GET', uri);
    } catch (error) {
      throw new CrawlError(
        ErrorCodes.REQUEST_FAILED,
        `GET ${uri} failed: ${error instanceof Error ? error.message : String(error)}`,
        { uri }
      );
    }

    if (!response.ok) {
      const text = response.body;
      const sanitized = text.length > 200 ? text.substring(0, 200) + '...' : text;
      throw new CrawlError(
        ErrorCodes.REQUEST_FAILED,
        `GET ${uri} failed: HTTP ${response.status}${sanitized ? ` - ${sanitized}` : ''}`,
        { uri, status: response.status }
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch {
      throw new CrawlError(ErrorCodes.INVALID_PAYLOAD, `GET ${uri} did not return JSON`, { uri });
    }
    if (!isJsonObject(data) || !isJsonValue(data)) {
      throw new CrawlError(ErrorCodes.INVALID_PAYLOAD, `GET ${uri} did not return a JSON object`, { uri });
    }
    return data;
  }

  async logout(): Promise<void> {
    const sessionUri = this.sessionUri;
    this.sessionUri = undefined;
    if (sessionUri === undefined) {
      this.token = undefined;
      return;
    }

    try {
      const response = await this.request('DELETE', sessionUri);
      if (!response.ok) {
        logger.warn(`Could not delete session ${sessionUri}: HTTP ${response.status}`);
      }
    } catch (error) {
      logger.warn(`Could not delete session ${sessionUri}: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      this.token = undefined;
    }
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.token !== undefined) {
      headers['X-Auth-Token'] = this.token;
    } else if (this.config.auth === 'basic') {
      const credentials = Buffer.from(`${this.config.username}:${this.config.password}`).toString('base64');
      headers['Authorization'] = `Basic ${credentials}`;
    }
    return headers;
  }

  /**
   * Send one request and read the whole body. The timeout covers both the
   * response headers and the body.
   */
  private async request(method: 'GET' | 'POST' | 'DELETE', uri: string, body?: JsonObject): Promise<HttpReply> {
    const { timeoutMs } = this.config;
    const controller = new AbortController();
    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(new Error(`timed out after ${timeoutMs} ms`)), {
        once: true,
      });
    });
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await Promise.race([
        fetch(new URL(uri, this.config.baseUrl), {
          method,
          headers: this.headers(body !== undefined),
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: controller.signal,
        }),
        timedOut,
      ]);
      const text = await Promise.race([response.text(), timedOut]);
      return { ok: response.ok, status: response.status, headers: response.headers, body: text };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Join a service root path and a relative path with exactly one slash.
 */
export function joinServicePath(root: string, relative: string): string {
  return `${root.replace(/\/+$/, '')}/${relative.replace(/^\/+/, '')}`;
}
