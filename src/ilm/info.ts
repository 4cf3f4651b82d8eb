import { createLogger } from '../logger';
import type { ClusterApi } from '../transport/cluster';
import type { LifecycleExplainEntry, LifecycleRow, RawPolicyBody } from '../types/ilm';
import { parseDuration } from './composer';

const log = createLogger('ilm:info');

const TRANSITION_PHASES = ['warm', 'cold', 'delete'] as const;

function transitionDate(
  lifecycleDateMillis: number,
  policy: RawPolicyBody | undefined,
  phase: (typeof TRANSITION_PHASES)[number],
): Date | undefined {
  const definition = policy?.phases?.[phase];
  if (!definition) {
    return undefined;
  }
  const offset = parseDuration(definition.min_age ?? '0ms').unwrapOr(0);
  return new Date(lifecycleDateMillis + offset);
}

function buildRow(
  entry: LifecycleExplainEntry,
  policies: Record<string, RawPolicyBody>,
  sizeBytes: number,
  stateManaged: boolean,
): LifecycleRow {
  if (!entry.managed || !entry.policy) {
    return { index: entry.index, policy: 'unmanaged', phase: '-', age: '-', sizeBytes };
  }

  const row: LifecycleRow = {
    index: entry.index,
    policy: entry.policy,
    phase: entry.phase ?? 'unknown',
    // ISM reports no age
    age: entry.age ?? (stateManaged ? '-' : 'unknown'),
    sizeBytes,
  };
  if (entry.lifecycleDateMillis !== undefined) {
    const policy = policies[entry.policy];
    row.warmAt = transitionDate(entry.lifecycleDateMillis, policy, 'warm');
    row.coldAt = transitionDate(entry.lifecycleDateMillis, policy, 'cold');
    row.deleteAt = transitionDate(entry.lifecycleDateMillis, policy, 'delete');
  }
  return row;
}

/**
 * Lifecycle overview of every index.
 *
 * Joins the lifecycle state of each index with its policy and store size.
 * Transition dates are the lifecycle date plus each phase's `min_age`.
 * On OpenSearch the index state management state stands in for the phase,
 * without age or transition dates.
 *
 * @param cluster - Cluster of the target
 * @param options - `all` includes indices without a policy
 * @returns Rows sorted by size, largest first
 */
export async function getLifecycleInfo(
  cluster: ClusterApi,
  options: { all?: boolean } = {},
): Promise<LifecycleRow[]> {
  const stateManaged = (await cluster.distribution()) === 'opensearch';
  const [entries, policies, sizes] = await Promise.all([
    stateManaged ? cluster.explainStateManagement() : cluster.explainLifecycle(),
    stateManaged ? Promise.resolve<Record<string, RawPolicyBody>>({}) : cluster.listPolicies(),
    cluster.indexStoreSizes(),
  ]);

  const rows = entries
    .filter((entry) => options.all === true || (entry.managed && entry.policy !== undefined))
    .map((entry) => buildRow(entry, policies, sizes[entry.index] ?? 0, stateManaged));

  rows.sort((a, b) => b.sizeBytes - a.sizeBytes);
  log.debug(
    { 'index.count': rows.length },
    `Collected lifecycle info for ${String(rows.length)} indices`,
  );
  return rows;
}
