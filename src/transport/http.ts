/**
 * HTTP access to the dashboards application.
 *
 * Handles TLS setup per target, basic authentication, the xsrf headers the
 * dashboards application requires on writes, per-request timeouts and the
 * translation of transport failures into dashsync errors.
 */

import { Agent, fetch as undiciFetch } from 'undici';
import { createLogger } from '../logger';
import type { Credentials, ServerTarget } from '../types/config';
import { AuthError, ConnectionError, RequestError } from '../types/errors';
import { joinUrl } from '../utils';

const log = createLogger('transport:http');

export type FetchFn = typeof globalThis.fetch;

/**
 * Creates fetch function with the TLS settings of a target.
 *
 * Uses undici's Agent to disable certificate verification when the profile
 * sets `verify_ssl: false`. Falls back to global fetch otherwise.
 *
 * @param target - Resolved server target
 * @returns Fetch function with TLS configuration
 */
export function createTlsFetch(target: ServerTarget): FetchFn {
  if (target.verifySsl) {
    return globalThis.fetch;
  }

  log.debug(
    { 'target.name': target.name },
    `TLS verification disabled for target '${target.name}'`,
  );
  const agent = new Agent({
    connect: {
      rejectUnauthorized: false,
    },
  });

  return ((url, options) =>
    undiciFetch(url, {
      ...options,
      dispatcher: agent,
    })) as FetchFn;
}

export function basicAuthHeader(credentials: Credentials): string {
  return `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64')}`;
}

/**
 * Response of the dashboards application with the body already read.
 */
export interface DashboardsResponse {
  status: number;
  /** Parsed JSON body, undefined when the body is empty or not JSON */
  body: unknown;
  /** Raw body text */
  text: string;
  url: string;
}

export interface DashboardsRequest {
  query?: Record<string, string | string[]>;
  body?: unknown;
}

/**
 * Join a base URL and a path, then append the query string.
 */
export function buildUrl(
  base: string,
  path: string,
  query?: Record<string, string | string[]>,
): string {
  const url = joinUrl(base, path);
  if (!query) {
    return url;
  }
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      params.append(key, item);
    }
  }
  const search = params.toString();
  return search === '' ? url : `${url}?${search}`;
}

/** Parsed JSON body, undefined when the text is empty or not JSON */
export function parseJsonBody(text: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Thin client over the dashboards application's HTTP API.
 *
 * Never throws for an HTTP status; only transport failures (refused
 * connection, DNS, timeout) become a ConnectionError. Use
 * {@link assertOk} to turn unexpected statuses into errors.
 */
export class DashboardsHttp {
  constructor(
    private readonly target: ServerTarget,
    private readonly fetchFn: FetchFn,
    private readonly timeoutMs: number,
  ) {}

  async request(
    method: string,
    path: string,
    options: DashboardsRequest = {},
  ): Promise<DashboardsResponse> {
    const url = buildUrl(this.target.dashboardsBaseUrl, path, options.query);
    const headers: Record<string, string> = {
      'kbn-xsrf': 'true',
      'osd-xsrf': 'true',
      Accept: 'application/json',
    };
    if (this.target.credentials) {
      headers.Authorization = basicAuthHeader(this.target.credentials);
    }
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    log.trace({ 'http.request.method': method, 'url.full': url }, `${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (fetchErr) {
      const cause = fetchErr instanceof Error ? fetchErr : undefined;
      const reason =
        cause?.name === 'TimeoutError'
          ? `timed out after ${String(this.timeoutMs)}ms`
          : (cause?.message ?? String(fetchErr));
      throw new ConnectionError(`Request to ${url} failed: ${reason}`, url, undefined, cause);
    }

    const text = await response.text();
    return { status: response.status, body: parseJsonBody(text), text, url };
  }
}

/**
 * Throws the matching error for a non-2xx response.
 *
 * - 401/403 → AuthError
 * - 5xx → ConnectionError with status
 * - anything else → RequestError
 *
 * @param response - Response to check
 * @param action - Description used in the message (e.g., 'List saved objects')
 */
export function assertOk(response: DashboardsResponse, action: string): void {
  const { status, url } = response;
  if (status >= 200 && status < 300) {
    return;
  }
  const message = `${action} failed with HTTP ${String(status)}`;
  if (status === 401 || status === 403) {
    throw new AuthError(message, url, status);
  }
  if (status >= 500) {
    throw new ConnectionError(message, url, status);
  }
  throw new RequestError(message, url, status, response.text);
}
