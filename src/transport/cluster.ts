/**
 * Access to the search cluster's REST API.
 *
 * {@link ClusterApi} is the seam used by the legacy saved-object backend,
 * the lifecycle commands and the raw passthrough. The production
 * implementation speaks REST over a {@link ClusterTransport}: the official
 * client for Elasticsearch, plain fetch for OpenSearch. Tests use an
 * in-memory ClusterApi.
 */

import { createLogger } from '../logger';
import type { RuntimeConfig, ServerTarget } from '../types/config';
import { UnsupportedOperationError } from '../types/errors';
import type { LifecycleExplainEntry, RawPolicyBody } from '../types/ilm';
import { parseRawPolicy } from '../types/ilm';
import { isRecord } from '../utils';
import { ElasticsearchTransport, createClusterClient } from './elasticsearch';
import { FetchClusterTransport } from './fetch-cluster';
import type { FetchFn } from './http';
import { createTlsFetch } from './http';

const log = createLogger('transport:cluster');

export type ClusterDistribution = 'elasticsearch' | 'opensearch';

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'HEAD';

/** JSON object, or a string sent as is (e.g. NDJSON) */
export type RawBody = Record<string, unknown> | string;

export interface ClusterRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  body?: RawBody;
  /** Statuses returned to the caller instead of thrown */
  ignore?: readonly number[];
}

export interface ClusterResponse {
  status: number;
  body: unknown;
}

export interface ClusterTransport {
  request(request: ClusterRequest): Promise<ClusterResponse>;
}

export interface ClusterDocument {
  id: string;
  source: unknown;
}

/** One page of a scrolled search */
export interface ScrollPage {
  hits: ClusterDocument[];
  total: number;
  /** Cursor of the next page; absent when the index is missing */
  scrollId?: string;
}

export interface ScrollOptions {
  size: number;
  /** How long the server keeps the cursor between pages, e.g. '1m' */
  keepAlive: string;
  /** Restrict to documents whose `type` field is one of these */
  types?: readonly string[];
}

export interface ClusterApi {
  /** Which product answers on the cluster URL */
  distribution(): Promise<ClusterDistribution>;
  /** Source of a document, undefined when the document or index is missing */
  getDocument(index: string, id: string): Promise<unknown>;
  indexDocument(
    index: string,
    id: string,
    source: Record<string, unknown>,
  ): Promise<'created' | 'updated'>;
  /** True when a document was deleted, false when it did not exist */
  deleteDocument(index: string, id: string): Promise<boolean>;
  /** First page of a scrolled search in index order; empty when the index is missing */
  openScroll(index: string, options: ScrollOptions): Promise<ScrollPage>;
  /** Next page of a scrolled search */
  continueScroll(scrollId: string, keepAlive: string): Promise<ScrollPage>;
  clearScroll(scrollId: string): Promise<void>;
  /** Body of a lifecycle policy, undefined when it does not exist */
  getPolicy(name: string): Promise<RawPolicyBody | undefined>;
  putPolicy(name: string, body: RawPolicyBody): Promise<void>;
  listPolicies(): Promise<Record<string, RawPolicyBody>>;
  /** Index lifecycle state (Elasticsearch `_ilm/explain`) */
  explainLifecycle(): Promise<LifecycleExplainEntry[]>;
  /** Index state management state (OpenSearch `_plugins/_ism/explain`) */
  explainStateManagement(): Promise<LifecycleExplainEntry[]>;
  /** Primary plus replica store size per index, in bytes */
  indexStoreSizes(): Promise<Record<string, number>>;
  /** True when the index was deleted, false when it did not exist */
  deleteIndex(name: string): Promise<boolean>;
  rawRequest(method: HttpMethod, path: string, body?: RawBody): Promise<unknown>;
}

const ISM_POLICY_KEYS = [
  'index.plugins.index_state_management.policy_id',
  'index.opendistro.index_state_management.policy_id',
  'policy_id',
] as const;

/**
 * Ask the cluster root endpoint which product it runs.
 *
 * OpenSearch reports `version.distribution: "opensearch"`; anything else
 * is treated as Elasticsearch.
 */
export async function detectDistribution(
  transport: ClusterTransport,
): Promise<ClusterDistribution> {
  const { body } = await transport.request({ method: 'GET', path: '/' });
  const version = isRecord(body) ? body.version : undefined;
  const distribution = isRecord(version) ? version.distribution : undefined;
  return typeof distribution === 'string' && distribution.toLowerCase().includes('opensearch')
    ? 'opensearch'
    : 'elasticsearch';
}

function parseExplainEntry(name: string, raw: unknown): LifecycleExplainEntry {
  if (!isRecord(raw)) {
    return { index: name, managed: false };
  }
  return {
    index: name,
    managed: raw.managed === true,
    policy: typeof raw.policy === 'string' ? raw.policy : undefined,
    phase: typeof raw.phase === 'string' ? raw.phase : undefined,
    age: typeof raw.age === 'string' ? raw.age : undefined,
    lifecycleDateMillis:
      typeof raw.lifecycle_date_millis === 'number' ? raw.lifecycle_date_millis : undefined,
  };
}

/**
 * Read one entry of `_plugins/_ism/explain`. ISM has states instead of
 * phases; the state name fills the phase column.
 */
export function parseIsmExplainEntry(
  name: string,
  raw: Record<string, unknown>,
): LifecycleExplainEntry {
  let policy: string | undefined;
  for (const key of ISM_POLICY_KEYS) {
    const value = raw[key];
    if (typeof value === 'string') {
      policy = value;
      break;
    }
  }
  const state = raw.state;
  return {
    index: name,
    managed: policy !== undefined,
    policy,
    phase: isRecord(state) && typeof state.name === 'string' ? state.name : undefined,
  };
}

function parsePolicyEntry(raw: unknown): RawPolicyBody | undefined {
  return isRecord(raw) ? parseRawPolicy(raw.policy) : undefined;
}

function parseScrollPage(body: unknown): ScrollPage {
  const hits: ClusterDocument[] = [];
  const outer = isRecord(body) ? body.hits : undefined;
  const list = isRecord(outer) && Array.isArray(outer.hits) ? outer.hits : [];
  for (const hit of list) {
    if (isRecord(hit) && typeof hit._id === 'string') {
      hits.push({ id: hit._id, source: hit._source });
    }
  }
  const total = isRecord(outer) ? outer.total : undefined;
  const scrollId = isRecord(body) ? body._scroll_id : undefined;
  return {
    hits,
    total:
      typeof total === 'number'
        ? total
        : isRecord(total) && typeof total.value === 'number'
          ? total.value
          : hits.length,
    scrollId: typeof scrollId === 'string' ? scrollId : undefined,
  };
}

function documentPath(index: string, id: string): string {
  return `/${encodeURIComponent(index)}/_doc/${encodeURIComponent(id)}`;
}

interface Connection {
  distribution: ClusterDistribution;
  transport: ClusterTransport;
}

/**
 * {@link ClusterApi} over the cluster's REST endpoints.
 *
 * The distribution is read through `fetchTransport` on first use;
 * Elasticsearch requests then go through the transport built by
 * `elasticsearch`, and OpenSearch requests stay on `fetchTransport`.
 */
export class RestCluster implements ClusterApi {
  private connection?: Promise<Connection>;

  constructor(
    private readonly target: ServerTarget,
    private readonly fetchTransport: ClusterTransport,
    private readonly elasticsearch: () => ClusterTransport,
  ) {}

  private connect(): Promise<Connection> {
    this.connection ??= this.detect().catch((error: unknown) => {
      this.connection = undefined;
      throw error;
    });
    return this.connection;
  }

  private async detect(): Promise<Connection> {
    const distribution = await detectDistribution(this.fetchTransport);
    log.debug(
      { 'target.name': this.target.name, 'cluster.distribution': distribution },
      `Target '${this.target.name}' runs ${distribution}`,
    );
    return {
      distribution,
      transport: distribution === 'opensearch' ? this.fetchTransport : this.elasticsearch(),
    };
  }

  private async send(request: ClusterRequest): Promise<ClusterResponse> {
    const { transport } = await this.connect();
    return transport.request(request);
  }

  private async requireIlm(action: string): Promise<void> {
    const { distribution } = await this.connect();
    if (distribution === 'opensearch') {
      throw new UnsupportedOperationError(
        `${action} needs Elasticsearch index lifecycle management; target '${this.target.name}' runs OpenSearch`,
      );
    }
  }

  async distribution(): Promise<ClusterDistribution> {
    return (await this.connect()).distribution;
  }

  async getDocument(index: string, id: string): Promise<unknown> {
    const { status, body } = await this.send({
      method: 'GET',
      path: documentPath(index, id),
      ignore: [404],
    });
    return status !== 404 && isRecord(body) && body.found === true ? body._source : undefined;
  }

  async indexDocument(
    index: string,
    id: string,
    source: Record<string, unknown>,
  ): Promise<'created' | 'updated'> {
    const { body } = await this.send({
      method: 'PUT',
      path: documentPath(index, id),
      query: { refresh: 'wait_for' },
      body: source,
    });
    return isRecord(body) && body.result === 'created' ? 'created' : 'updated';
  }

  async deleteDocument(index: string, id: string): Promise<boolean> {
    const { status, body } = await this.send({
      method: 'DELETE',
      path: documentPath(index, id),
      query: { refresh: 'wait_for' },
      ignore: [404],
    });
    return status !== 404 && isRecord(body) && body.result === 'deleted';
  }

  async openScroll(index: string, options: ScrollOptions): Promise<ScrollPage> {
    const query =
      options.types && options.types.length > 0
        ? { bool: { filter: [{ terms: { type: [...options.types] } }] } }
        : { match_all: {} };
    const { status, body } = await this.send({
      method: 'POST',
      path: `/${encodeURIComponent(index)}/_search`,
      query: { scroll: options.keepAlive },
      body: { size: options.size, sort: ['_doc'], query },
      ignore: [404],
    });
    return status === 404 ? { hits: [], total: 0 } : parseScrollPage(body);
  }

  async continueScroll(scrollId: string, keepAlive: string): Promise<ScrollPage> {
    const { body } = await this.send({
      method: 'POST',
      path: '/_search/scroll',
      body: { scroll: keepAlive, scroll_id: scrollId },
    });
    return parseScrollPage(body);
  }

  async clearScroll(scrollId: string): Promise<void> {
    await this.send({
      method: 'DELETE',
      path: '/_search/scroll',
      body: { scroll_id: scrollId },
      ignore: [404],
    });
  }

  async getPolicy(name: string): Promise<RawPolicyBody | undefined> {
    await this.requireIlm(`Reading policy '${name}'`);
    const { status, body } = await this.send({
      method: 'GET',
      path: `/_ilm/policy/${encodeURIComponent(name)}`,
      ignore: [404],
    });
    return status !== 404 && isRecord(body) ? parsePolicyEntry(body[name]) : undefined;
  }

  async putPolicy(name: string, body: RawPolicyBody): Promise<void> {
    await this.requireIlm(`Storing policy '${name}'`);
    await this.send({
      method: 'PUT',
      path: `/_ilm/policy/${encodeURIComponent(name)}`,
      body: { policy: body },
    });
  }

  async listPolicies(): Promise<Record<string, RawPolicyBody>> {
    await this.requireIlm('Listing policies');
    const { body } = await this.send({ method: 'GET', path: '/_ilm/policy' });
    const policies: Record<string, RawPolicyBody> = {};
    for (const [name, entry] of Object.entries(isRecord(body) ? body : {})) {
      const parsed = parsePolicyEntry(entry);
      if (parsed) {
        policies[name] = parsed;
      }
    }
    return policies;
  }

  async explainLifecycle(): Promise<LifecycleExplainEntry[]> {
    await this.requireIlm('Explaining index lifecycles');
    const { body } = await this.send({ method: 'GET', path: '/*/_ilm/explain' });
    const indices = isRecord(body) && isRecord(body.indices) ? body.indices : {};
    return Object.entries(indices).map(([name, entry]) => parseExplainEntry(name, entry));
  }

  async explainStateManagement(): Promise<LifecycleExplainEntry[]> {
    const { body } = await this.send({ method: 'GET', path: '/_plugins/_ism/explain/*' });
    const entries: LifecycleExplainEntry[] = [];
    // Non-object values are totals such as total_managed_indices
    for (const [name, entry] of Object.entries(isRecord(body) ? body : {})) {
      if (isRecord(entry)) {
        entries.push(parseIsmExplainEntry(name, entry));
      }
    }
    return entries;
  }

  async indexStoreSizes(): Promise<Record<string, number>> {
    const { body } = await this.send({ method: 'GET', path: '/*/_stats/store' });
    const sizes: Record<string, number> = {};
    const indices = isRecord(body) && isRecord(body.indices) ? body.indices : {};
    for (const [name, stats] of Object.entries(indices)) {
      const total = isRecord(stats) ? stats.total : undefined;
      const store = isRecord(total) ? total.store : undefined;
      const size = isRecord(store) ? store.size_in_bytes : undefined;
      sizes[name] = typeof size === 'number' ? size : 0;
    }
    return sizes;
  }

  async deleteIndex(name: string): Promise<boolean> {
    const { status, body } = await this.send({
      method: 'DELETE',
      path: `/${encodeURIComponent(name)}`,
      ignore: [404],
    });
    return status !== 404 && isRecord(body) && body.acknowledged === true;
  }

  async rawRequest(method: HttpMethod, path: string, body?: RawBody): Promise<unknown> {
    const response = await this.send({
      method,
      path: path.startsWith('/') ? path : `/${path}`,
      body,
    });
    return response.body;
  }
}

/**
 * Build the production cluster of a target.
 *
 * @param target - Resolved server target
 * @param runtime - Runtime settings (request timeout)
 * @param fetchFn - Fetch used to detect the distribution and for OpenSearch (defaults to createTlsFetch)
 */
export function createCluster(
  target: ServerTarget,
  runtime: RuntimeConfig,
  fetchFn: FetchFn = createTlsFetch(target),
): RestCluster {
  return new RestCluster(
    target,
    new FetchClusterTransport(target, fetchFn, runtime.requestTimeoutMs),
    () =>
      new ElasticsearchTransport(
        createClusterClient(target, runtime.requestTimeoutMs),
        target.clusterBaseUrl,
      ),
  );
}
