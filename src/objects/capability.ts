import { createLogger, serializeError } from '../logger';
import type { DashboardsHttp, DashboardsResponse } from '../transport/http';
import type { ServerTarget } from '../types/config';
import { isRecord } from '../utils';
import type { BackendMode } from './backend';

const log = createLogger('objects:capability');

export interface BackendDetection {
  mode: BackendMode;
  /** Why the legacy index was chosen; absent for the management API */
  warning?: string;
}

// Process-wide, keyed by target name; never persisted
const detections = new Map<string, Promise<BackendDetection>>();

/**
 * Forget every cached detection. Tests only.
 */
export function resetCapabilityCache(): void {
  detections.clear();
}

function isDashboardsNotFound(body: unknown): boolean {
  return (
    isRecord(body) &&
    body.statusCode === 404 &&
    typeof body.error === 'string' &&
    typeof body.message === 'string'
  );
}

/**
 * Classify the capability check response.
 *
 * A 2xx `_find` body, or the dashboards application's own 404 body, proves
 * the management API is served. Anything else falls back to the index.
 */
export function classifyCapability(response: DashboardsResponse): BackendDetection {
  const { status, body } = response;
  if (status >= 200 && status < 300 && isRecord(body) && Array.isArray(body.saved_objects)) {
    return { mode: 'ModernApi' };
  }
  if (status === 404 && isDashboardsNotFound(body)) {
    return { mode: 'ModernApi' };
  }
  const reason =
    status >= 200 && status < 300
      ? `unrecognised response body (HTTP ${String(status)})`
      : `HTTP ${String(status)}`;
  return {
    mode: 'LegacyIndex',
    warning: `Saved objects API not available at ${response.url} (${reason}); using the legacy index`,
  };
}

async function checkCapability(target: ServerTarget, http: DashboardsHttp): Promise<BackendDetection> {
  try {
    const response = await http.request('GET', '/api/saved_objects/_find', {
      query: { per_page: '1', type: 'index-pattern' },
    });
    return classifyCapability(response);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.debug({ ...serializeError(err), 'target.name': target.name }, 'Capability check failed');
    return {
      mode: 'LegacyIndex',
      warning: `Saved objects API not reachable for '${target.name}' (${message}); using the legacy index`,
    };
  }
}

/**
 * Decide which backend serves a target.
 *
 * Checks the management API once per target and process; later calls
 * return the cached decision. Never throws.
 *
 * @param target - Resolved target
 * @param http - Dashboards client of the target
 * @returns Backend mode, with a warning when falling back
 */
export async function detectBackend(
  target: ServerTarget,
  http: DashboardsHttp,
): Promise<BackendDetection> {
  let detection = detections.get(target.name);
  if (!detection) {
    detection = checkCapability(target, http);
    detections.set(target.name, detection);
  }
  const result = await detection;
  if (result.warning) {
    log.warn({ 'target.name': target.name, 'backend.mode': result.mode }, result.warning);
  } else {
    log.debug(
      { 'target.name': target.name, 'backend.mode': result.mode },
      `Using ${result.mode} backend for '${target.name}'`,
    );
  }
  return result;
}
