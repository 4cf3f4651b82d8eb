import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';
import { withSpan, SpanAttributes } from '../instrumentation';
import { createLogger } from '../logger';
import type { ClusterApi } from '../transport/cluster';
import type { InvalidPhaseOrderingError } from '../types/errors';
import type { ILMPolicy, PolicyEdit } from '../types/ilm';
import { applyPolicyEdit, fromRawPolicy, toRawPolicy } from './composer';

const log = createLogger('ilm:policies');

/**
 * Load a lifecycle policy.
 *
 * @returns The policy, or undefined when it does not exist
 */
export async function getPolicy(
  cluster: ClusterApi,
  name: string,
): Promise<ILMPolicy | undefined> {
  const raw = await cluster.getPolicy(name);
  return raw ? fromRawPolicy(name, raw) : undefined;
}

/**
 * Read, edit and store a lifecycle policy.
 *
 * A missing policy is created from the edit alone. When the edit is
 * rejected nothing is written.
 *
 * @param cluster - Cluster of the target
 * @param name - Policy name
 * @param edit - Phase edit
 * @returns Result with the stored policy, or the ordering violation
 */
export async function editPolicy(
  cluster: ClusterApi,
  name: string,
  edit: PolicyEdit,
): Promise<Result<ILMPolicy, InvalidPhaseOrderingError>> {
  return withSpan(
    'edit_policy',
    { [SpanAttributes.POLICY_NAME]: name, [SpanAttributes.POLICY_PHASE]: edit.phase },
    async () => {
      const current = await getPolicy(cluster, name);
      if (!current) {
        log.info({ 'policy.name': name }, `Policy '${name}' does not exist, creating it`);
      }

      const result = applyPolicyEdit(current, name, edit);
      if (result.isErr()) {
        log.warn(
          { 'policy.name': name, 'policy.phase': edit.phase },
          `Policy edit rejected: ${result.error.message}`,
        );
        return result;
      }

      await cluster.putPolicy(name, toRawPolicy(result.value));
      log.info(
        { 'policy.name': name, 'policy.phase': edit.phase },
        `Policy '${name}' updated (${edit.phase})`,
      );
      return ok(result.value);
    },
  );
}
