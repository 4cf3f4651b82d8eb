import { createLogger } from '../logger';
import type { ServerTarget } from '../types/config';
import { ConnectionError } from '../types/errors';
import type { ClusterRequest, ClusterResponse, ClusterTransport } from './cluster';
import type { FetchFn } from './http';
import { assertOk, basicAuthHeader, buildUrl, parseJsonBody } from './http';

const log = createLogger('transport:fetch-cluster');

/**
 * Cluster transport over plain fetch.
 *
 * Works against any distribution, so it also answers the distribution
 * check. Statuses listed in `ignore` are returned instead of thrown.
 */
export class FetchClusterTransport implements ClusterTransport {
  constructor(
    private readonly target: ServerTarget,
    private readonly fetchFn: FetchFn,
    private readonly timeoutMs: number,
  ) {}

  async request(request: ClusterRequest): Promise<ClusterResponse> {
    const url = buildUrl(this.target.clusterBaseUrl, request.path, request.query);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.target.credentials) {
      headers.Authorization = basicAuthHeader(this.target.credentials);
    }
    let body: string | undefined;
    if (typeof request.body === 'string') {
      headers['Content-Type'] = 'application/x-ndjson';
      body = request.body;
    } else if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    log.trace(
      { 'http.request.method': request.method, 'url.full': url },
      `${request.method} ${url}`,
    );

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: request.method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (fetchErr) {
      const cause = fetchErr instanceof Error ? fetchErr : undefined;
      const reason =
        cause?.name === 'TimeoutError'
          ? `timed out after ${String(this.timeoutMs)}ms`
          : (cause?.message ?? String(fetchErr));
      throw new ConnectionError(`Cannot reach cluster at ${url}: ${reason}`, url, undefined, cause);
    }

    const text = request.method === 'HEAD' ? '' : await response.text();
    if (!request.ignore?.includes(response.status)) {
      assertOk(
        { status: response.status, body: undefined, text, url },
        `Cluster request ${request.method} ${request.path}`,
      );
    }
    return { status: response.status, body: parseJsonBody(text) };
  }
}
