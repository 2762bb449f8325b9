/**
 * SentryClient: HTTP client for the Sentry release API.
 *
 * Uses Node.js built-in `node:http` / `node:https`, picked from the
 * base URL's protocol. All paths live under `<baseUrl>/api/0`. Requests
 * carry a bearer token and JSON bodies; each has a fixed wall-clock
 * timeout covering the full response and honors the caller's AbortSignal.
 *
 * Failures:
 * - connection error, timeout, abort → TransportError
 * - non-2xx → RemoteApiError with the JSON `detail` field, or the raw body
 * - unparseable 2xx body → TransportError
 */

import * as http from 'node:http';
import * as https from 'node:https';
import { randomUUID } from 'node:crypto';

import { createLogger, type Logger } from '../logger.js';
import { RemoteApiError, TransportError, ValidationError, errorMessage } from '../release-error.js';
import { DEFAULT_URL, isRecord } from '../../types/config.js';
import type {
  CommitRecord,
  CreateDeployInput,
  CreateReleaseInput,
  Organization,
  RemoteDeploy,
  RemoteRelease,
  TrackerClient,
  TrackerConnection,
} from './tracker-client.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SentryClientOptions extends TrackerConnection {
  /** Request timeout in milliseconds (default 30_000). */
  timeoutMs?: number;
  logger?: Logger;
}

/** Default request timeout: 30 seconds. */
export const DEFAULT_TIMEOUT_MS = 30_000;

const API_PREFIX = '/api/0';

type Method = 'GET' | 'POST' | 'PUT';

// ---------------------------------------------------------------------------
// Response decoding
// ---------------------------------------------------------------------------

/** JSON body parsed to an object, or a TransportError. */
function parseObject(body: string, path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new TransportError(`failed to unmarshal response from ${path}: ${errorMessage(err)}`, err);
  }
  if (!isRecord(parsed)) {
    throw new TransportError(`failed to unmarshal response from ${path}: expected a JSON object`);
  }
  return parsed;
}

function str(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function toRelease(record: Record<string, unknown>): RemoteRelease {
  const release: RemoteRelease = { version: str(record, 'version') ?? '' };
  const shortVersion = str(record, 'shortVersion');
  const ref = str(record, 'ref');
  const url = str(record, 'url');
  const dateCreated = str(record, 'dateCreated');
  if (shortVersion !== undefined) release.shortVersion = shortVersion;
  if (ref !== undefined) release.ref = ref;
  if (url !== undefined) release.url = url;
  if (dateCreated !== undefined) release.dateCreated = dateCreated;
  if ('dateReleased' in record) release.dateReleased = str(record, 'dateReleased') ?? null;

  const projects = record['projects'];
  if (Array.isArray(projects)) {
    release.projects = projects.filter(isRecord).map((p) => ({
      id: str(p, 'id') ?? '',
      name: str(p, 'name') ?? '',
      slug: str(p, 'slug') ?? '',
    }));
  }
  return release;
}

function toDeploy(record: Record<string, unknown>): RemoteDeploy {
  const deploy: RemoteDeploy = {
    id: str(record, 'id') ?? '',
    environment: str(record, 'environment') ?? '',
  };
  const name = str(record, 'name');
  const dateStarted = str(record, 'dateStarted');
  const dateFinished = str(record, 'dateFinished');
  if (name !== undefined) deploy.name = name;
  if (dateStarted !== undefined) deploy.dateStarted = dateStarted;
  if (dateFinished !== undefined) deploy.dateFinished = dateFinished;
  return deploy;
}

/** `detail` from a JSON error body, else the raw body. */
export function errorDetail(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed) && typeof parsed['detail'] === 'string' && parsed['detail'] !== '') {
      return parsed['detail'];
    }
  } catch {
    // not JSON: fall through to the raw body
  }
  return body;
}

// ---------------------------------------------------------------------------
// SentryClient
// ---------------------------------------------------------------------------

export class SentryClient implements TrackerClient {
  private readonly baseUrl: URL;
  private readonly authToken: string;
  private readonly org: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SentryClientOptions) {
    const base = options.url === '' ? DEFAULT_URL : options.url;
    if (!URL.canParse(base)) {
      throw new ValidationError('url', `Invalid Sentry URL: ${base}`);
    }
    this.baseUrl = new URL(base);
    if (this.baseUrl.protocol !== 'https:' && this.baseUrl.protocol !== 'http:') {
      throw new ValidationError(
        'url',
        `Unsupported URL protocol for Sentry API: ${this.baseUrl.protocol}`,
      );
    }
    this.authToken = options.authToken;
    this.org = options.org;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('sentry-client');
  }

  async getOrganization(signal?: AbortSignal): Promise<Organization> {
    const path = `/organizations/${this.orgSegment()}/`;
    const record = parseObject(await this.request('GET', path, undefined, signal), path);
    return {
      id: str(record, 'id') ?? '',
      slug: str(record, 'slug') ?? '',
      name: str(record, 'name') ?? '',
    };
  }

  async createRelease(input: CreateReleaseInput, signal?: AbortSignal): Promise<RemoteRelease> {
    const path = `/organizations/${this.orgSegment()}/releases/`;
    const body: Record<string, unknown> = {
      version: input.version,
      projects: input.projects,
      dateStarted: input.dateStarted,
    };
    if (input.ref !== undefined) body['ref'] = input.ref;
    if (input.url !== undefined) body['url'] = input.url;

    return toRelease(parseObject(await this.request('POST', path, body, signal), path));
  }

  async getRelease(version: string, signal?: AbortSignal): Promise<RemoteRelease> {
    const path = this.releasePath(version);
    return toRelease(parseObject(await this.request('GET', path, undefined, signal), path));
  }

  async setCommits(version: string, commits: CommitRecord[], signal?: AbortSignal): Promise<void> {
    await this.request('POST', `${this.releasePath(version)}commits/`, { commits }, signal);
  }

  async createDeploy(
    version: string,
    input: CreateDeployInput,
    signal?: AbortSignal,
  ): Promise<RemoteDeploy> {
    const path = `${this.releasePath(version)}deploys/`;
    const body: Record<string, unknown> = {
      environment: input.environment,
      dateStarted: input.dateStarted,
      dateFinished: input.dateFinished,
    };
    if (input.name !== undefined && input.name !== '') body['name'] = input.name;

    return toDeploy(parseObject(await this.request('POST', path, body, signal), path));
  }

  async finalizeRelease(version: string, dateReleased: string, signal?: AbortSignal): Promise<void> {
    await this.request('PUT', this.releasePath(version), { dateReleased }, signal);
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private orgSegment(): string {
    return encodeURIComponent(this.org);
  }

  private releasePath(version: string): string {
    return `/organizations/${this.orgSegment()}/releases/${encodeURIComponent(version)}/`;
  }

  /** Full URL for an API path, keeping any path prefix of the base URL. */
  private resolve(path: string): URL {
    const url = new URL(this.baseUrl.href);
    url.pathname = url.pathname.replace(/\/+$/, '') + API_PREFIX + path;
    return url;
  }

  /**
   * Send one request and resolve with the response body.
   * Rejects with RemoteApiError on status >= 400, TransportError otherwise.
   */
  private request(
    method: Method,
    path: string,
    body: unknown,
    signal?: AbortSignal,
  ): Promise<string> {
    const url = this.resolve(path);
    const payload = body === undefined ? undefined : JSON.stringify(body);
    const started = Date.now();

    const headers: Record<string, string | number> = {
      Authorization: `Bearer ${this.authToken}`,
      'Content-Type': 'application/json',
      Accept: 'application/json',
      'X-Request-ID': randomUUID(),
    };
    if (payload !== undefined) {
      headers['Content-Length'] = Buffer.byteLength(payload, 'utf-8');
    }

    if (signal?.aborted) {
      return Promise.reject(
        new TransportError(`failed to execute request: ${method} ${path} aborted`, signal.reason),
      );
    }

    return new Promise<string>((resolve, reject) => {
      const options: https.RequestOptions = { method, headers };
      if (signal !== undefined) {
        options.signal = signal;
      }
      if (url.protocol === 'https:') {
        options.minVersion = 'TLSv1.2';
      }

      let timedOut = false;
      let timer: ReturnType<typeof setTimeout> | undefined;
      const fail = (prefix: string, err: Error): void => {
        clearTimeout(timer);
        let reason = err.message;
        if (timedOut) {
          reason = `request timed out after ${this.timeoutMs}ms`;
        } else if (signal?.aborted) {
          reason = `${method} ${path} aborted`;
        }
        reject(new TransportError(`${prefix}: ${reason}`, err));
      };

      const onResponse = (res: http.IncomingMessage): void => {
        let data = '';
        res.setEncoding('utf-8');
        res.on('data', (chunk: string) => {
          data += chunk;
        });
        res.on('error', (err) => fail('failed to read response', err));
        res.on('close', () => {
          if (!res.complete) {
            fail('failed to read response', new Error('connection closed before the body ended'));
          }
        });
        res.on('end', () => {
          clearTimeout(timer);
          const status = res.statusCode ?? 0;
          this.logger.debug('sentry request finished', {
            method,
            path,
            status,
            duration_ms: Date.now() - started,
            ok: status < 400,
          });

          if (status >= 400) {
            reject(new RemoteApiError(status, errorDetail(data)));
            return;
          }
          resolve(data);
        });
      };

      const req =
        url.protocol === 'https:'
          ? https.request(url, options, onResponse)
          : http.request(url, options, onResponse);

      // Wall-clock limit for the whole exchange, body included.
      timer = setTimeout(() => {
        timedOut = true;
        req.destroy(new Error(`request timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      req.on('error', (err) => fail('failed to execute request', err));

      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }
}
