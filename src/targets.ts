import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { ServerProfile, ServerTarget } from './types/config';
import { UnknownTargetError } from './types/errors';
import { normalizePathPrefix } from './utils';

/**
 * Build the immutable connection target of a profile.
 *
 * Cluster and dashboards share scheme and host; `cluster_path` and
 * `base_path` are appended with exactly one separating slash.
 *
 * @param profile - Validated server profile
 * @param isDefault - Whether this is the first declared profile
 * @returns Frozen ServerTarget
 *
 * @example
 * ```typescript
 * createServerTarget({ name: 'prod', host: 'proxy:443', protocol: 'https',
 *   verifySsl: true, clusterPath: 'es/', basePath: '/kibana' }, true);
 * // clusterBaseUrl "https://proxy:443/es", dashboardsBaseUrl "https://proxy:443/kibana"
 * ```
 */
export function createServerTarget(profile: ServerProfile, isDefault: boolean): ServerTarget {
  const origin = `${profile.protocol}://${profile.host}`;
  return Object.freeze({
    name: profile.name,
    clusterBaseUrl: `${origin}${normalizePathPrefix(profile.clusterPath)}`,
    dashboardsBaseUrl: `${origin}${normalizePathPrefix(profile.basePath)}`,
    credentials: profile.credentials ? Object.freeze({ ...profile.credentials }) : undefined,
    verifySsl: profile.verifySsl,
    isDefault,
  });
}

/**
 * Resolve a target by name, or the default (first declared) target.
 *
 * @param servers - Declared profiles in declaration order
 * @param name - Requested target name; undefined selects the default
 * @returns Result with the target, or UnknownTargetError listing available names
 */
export function resolveTarget(
  servers: readonly ServerProfile[],
  name?: string,
): Result<ServerTarget, UnknownTargetError> {
  const available = servers.map((server) => server.name);

  if (name === undefined) {
    const first = servers[0];
    if (!first) {
      return err(new UnknownTargetError('(default)', available));
    }
    return ok(createServerTarget(first, true));
  }

  const index = servers.findIndex((server) => server.name === name);
  const profile = servers[index];
  if (!profile) {
    return err(new UnknownTargetError(name, available));
  }
  return ok(createServerTarget(profile, index === 0));
}

/**
 * List every declared target, default first.
 */
export function listTargets(servers: readonly ServerProfile[]): ServerTarget[] {
  return servers.map((server, index) => createServerTarget(server, index === 0));
}
