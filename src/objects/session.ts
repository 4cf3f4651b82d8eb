import { createLogger } from '../logger';
import { resolveTarget } from '../targets';
import type { ClusterApi } from '../transport/cluster';
import { createCluster } from '../transport/cluster';
import type { FetchFn } from '../transport/http';
import { DashboardsHttp, createTlsFetch } from '../transport/http';
import type { AppConfig, RuntimeConfig, ServerTarget } from '../types/config';
import type { SavedObjectBackend } from './backend';
import { detectBackend } from './capability';
import { LegacyIndexBackend } from './legacy-backend';
import { ModernApiBackend } from './modern-backend';
import { ObjectRepositoryClient } from './repository';

const log = createLogger('objects:session');

/**
 * Session dependencies for dependency injection.
 *
 * Tests inject an in-memory fetch and cluster; the CLI uses the defaults.
 */
export interface SessionDeps {
  /** Fetch function factory (defaults to createTlsFetch) */
  fetchFactory?: (target: ServerTarget) => FetchFn;
  /** Cluster factory (defaults to createCluster over the target's fetch) */
  clusterFactory?: (target: ServerTarget, runtime: RuntimeConfig) => ClusterApi;
  /** Backoff base delay for retries (defaults to 300ms) */
  retryBaseDelayMs?: number;
  /** Abort signal (e.g., from SIGINT) */
  signal?: AbortSignal;
}

export interface Session {
  target: ServerTarget;
  http: DashboardsHttp;
  cluster: ClusterApi;
  repository: ObjectRepositoryClient;
  /** Capability warnings to show the user */
  warnings: string[];
}

/**
 * Open the connections of a target without probing the backend.
 *
 * @throws {UnknownTargetError} When the target is not declared
 */
export function connectTarget(
  config: AppConfig,
  targetName: string | undefined,
  deps: SessionDeps = {},
): { target: ServerTarget; http: DashboardsHttp; cluster: ClusterApi } {
  const resolved = resolveTarget(config.servers, targetName);
  if (resolved.isErr()) {
    throw resolved.error;
  }
  const target = resolved.value;
  const fetchFn = (deps.fetchFactory ?? createTlsFetch)(target);
  const http = new DashboardsHttp(target, fetchFn, config.runtime.requestTimeoutMs);
  const cluster = deps.clusterFactory
    ? deps.clusterFactory(target, config.runtime)
    : createCluster(target, config.runtime, fetchFn);
  return { target, http, cluster };
}

/**
 * Resolve the target, detect its backend and build the repository.
 *
 * @param config - Validated application configuration
 * @param targetName - Target to use; undefined selects the default
 * @param deps - Injected dependencies
 * @returns Session ready for repository calls
 * @throws {UnknownTargetError} When the target is not declared
 */
export async function openSession(
  config: AppConfig,
  targetName: string | undefined,
  deps: SessionDeps = {},
): Promise<Session> {
  const { target, http, cluster } = connectTarget(config, targetName, deps);
  const detection = await detectBackend(target, http);

  const backend: SavedObjectBackend =
    detection.mode === 'ModernApi'
      ? new ModernApiBackend(http)
      : new LegacyIndexBackend(cluster, config.runtime.legacyIndex);

  log.debug(
    { 'target.name': target.name, 'backend.mode': backend.mode },
    `Session opened for '${target.name}'`,
  );

  const repository = new ObjectRepositoryClient(backend, {
    concurrency: config.runtime.concurrency,
    retries: config.runtime.maxRetries,
    retryBaseDelayMs: deps.retryBaseDelayMs,
    signal: deps.signal,
  });

  return {
    target,
    http,
    cluster,
    repository,
    warnings: detection.warning ? [detection.warning] : [],
  };
}
