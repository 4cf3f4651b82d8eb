/**
 * Cluster transport over the official Elasticsearch client.
 *
 * The client refuses servers that do not identify as Elasticsearch, so it
 * is only used once the cluster's distribution is known.
 */

import { Client, errors } from '@elastic/elasticsearch';
import type { ServerTarget } from '../types/config';
import { AuthError, ConnectionError, RequestError } from '../types/errors';
import type { ClusterRequest, ClusterResponse, ClusterTransport } from './cluster';

/**
 * Translate client failures into dashsync errors.
 *
 * @param error - Error thrown by the client
 * @param url - Target URL used in the message
 * @returns Error to throw
 */
export function translateClusterError(error: unknown, url: string): Error {
  if (error instanceof errors.ResponseError) {
    const status = error.statusCode ?? 0;
    const message = `Cluster request failed with HTTP ${String(status)}: ${error.message}`;
    if (status === 401 || status === 403) {
      return new AuthError(message, url, status, error);
    }
    if (status >= 500) {
      return new ConnectionError(message, url, status, error);
    }
    return new RequestError(message, url, status, JSON.stringify(error.meta.body ?? null));
  }
  if (
    error instanceof errors.ConnectionError ||
    error instanceof errors.TimeoutError ||
    error instanceof errors.NoLivingConnectionsError
  ) {
    return new ConnectionError(
      `Cannot reach cluster at ${url}: ${error.message}`,
      url,
      undefined,
      error,
    );
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Creates Elasticsearch client with authentication and TLS configuration.
 *
 * Retries are disabled in the client; the repository decides which requests
 * may be retried.
 *
 * @param target - Resolved server target
 * @param requestTimeoutMs - Per-request timeout
 * @returns Configured client
 */
export function createClusterClient(target: ServerTarget, requestTimeoutMs: number): Client {
  return new Client({
    node: target.clusterBaseUrl,
    auth: target.credentials
      ? { username: target.credentials.username, password: target.credentials.password }
      : undefined,
    tls: target.verifySsl ? undefined : { rejectUnauthorized: false },
    maxRetries: 0,
    requestTimeout: requestTimeoutMs,
  });
}

export class ElasticsearchTransport implements ClusterTransport {
  constructor(
    private readonly client: Client,
    private readonly url: string,
  ) {}

  async request(request: ClusterRequest): Promise<ClusterResponse> {
    try {
      const result = await this.client.transport.request<unknown>(
        {
          method: request.method,
          path: request.path,
          querystring: request.query,
          body: request.body,
        },
        { meta: true, ignore: request.ignore ? [...request.ignore] : undefined },
      );
      return { status: result.statusCode ?? 200, body: result.body };
    } catch (error) {
      throw translateClusterError(error, this.url);
    }
  }
}
