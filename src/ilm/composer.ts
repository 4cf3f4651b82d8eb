/**
 * Pure lifecycle policy composer.
 *
 * Converts between the cluster's policy JSON and {@link ILMPolicy}, and
 * applies single-phase edits. No I/O; the policy store does the get/put.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { InvalidPhaseOrderingError } from '../types/errors';
import type {
  HotPhase,
  ILMPolicy,
  PhaseName,
  PolicyEdit,
  PolicyPhase,
  RawPhase,
  RawPolicyBody,
} from '../types/ilm';
import { PHASE_ORDER } from '../types/ilm';
import { isRecord } from '../utils';

const DAY_MS = 86_400_000;

const UNIT_MS: Record<string, number> = {
  d: DAY_MS,
  h: 3_600_000,
  m: 60_000,
  s: 1000,
  ms: 1,
  micros: 0.001,
  nanos: 0.000001,
};

/**
 * Parse a time value such as '30d', '12h' or '0ms' into milliseconds.
 *
 * @param value - Time value with unit (d, h, m, s, ms, micros, nanos)
 * @returns Result with milliseconds, or the reason it is invalid
 */
export function parseDuration(value: string): Result<number, string> {
  const match = /^(\d+(?:\.\d+)?)(d|h|m|s|ms|micros|nanos)$/.exec(value.trim());
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined) {
    return err(`invalid time value '${value}'`);
  }
  return ok(Number(amount) * (UNIT_MS[unit] ?? 0));
}

const DEFAULT_ACTIONS: Record<Exclude<PhaseName, 'hot'>, () => Record<string, unknown>> = {
  warm: () => ({ set_priority: { priority: 50 } }),
  cold: () => ({ set_priority: { priority: 0 } }),
  delete: () => ({ delete: { delete_searchable_snapshot: true } }),
};

function fromRawPhase(raw: RawPhase): PolicyPhase {
  const { min_age: minAge, actions, ...extra } = raw;
  const phase: PolicyPhase = { actions: { ...(actions ?? {}) } };
  if (minAge !== undefined) {
    phase.minAge = minAge;
  }
  if (Object.keys(extra).length > 0) {
    phase.extra = extra;
  }
  return phase;
}

function fromRawHotPhase(raw: RawPhase): HotPhase {
  const phase: HotPhase = fromRawPhase(raw);
  const rollover = phase.actions.rollover;
  if (!isRecord(rollover)) {
    return phase;
  }

  const {
    max_primary_shard_size: maxSize,
    max_docs: maxDocs,
    ...otherSettings
  } = rollover;
  if (typeof maxSize === 'string') {
    phase.rolloverMaxSize = maxSize;
  }
  if (typeof maxDocs === 'number') {
    phase.rolloverMaxDocs = maxDocs;
  }
  phase.actions = { ...phase.actions, rollover: otherSettings };
  return phase;
}

/**
 * Build the typed model of a stored policy.
 *
 * @param name - Policy name
 * @param raw - Stored policy body
 */
export function fromRawPolicy(name: string, raw: RawPolicyBody): ILMPolicy {
  const { phases: rawPhases, _meta: meta, ...extra } = raw;
  const phases: Record<string, RawPhase> = rawPhases ?? {};
  const policy: ILMPolicy = { name, phases: {} };

  const { hot, warm, cold, delete: del, ...others } = phases;
  if (hot) policy.phases.hot = fromRawHotPhase(hot);
  if (warm) policy.phases.warm = fromRawPhase(warm);
  if (cold) policy.phases.cold = fromRawPhase(cold);
  if (del) policy.phases.delete = fromRawPhase(del);
  if (Object.keys(others).length > 0) policy.otherPhases = others;

  if (meta) policy.meta = meta;
  if (Object.keys(extra).length > 0) policy.extra = extra;
  return policy;
}

function toRawPhase(phase: PolicyPhase): RawPhase {
  const raw: RawPhase = { ...(phase.extra ?? {}) };
  if (phase.minAge !== undefined) {
    raw.min_age = phase.minAge;
  }
  raw.actions = { ...phase.actions };
  return raw;
}

function toRawHotPhase(phase: HotPhase): RawPhase {
  const raw = toRawPhase(phase);
  const actions: Record<string, unknown> = raw.actions ?? {};
  const rollover: Record<string, unknown> = isRecord(actions.rollover)
    ? { ...actions.rollover }
    : {};
  if (phase.rolloverMaxSize !== undefined) {
    rollover.max_primary_shard_size = phase.rolloverMaxSize;
  }
  if (phase.rolloverMaxDocs !== undefined) {
    rollover.max_docs = phase.rolloverMaxDocs;
  }

  const rest = { ...actions };
  delete rest.rollover;
  raw.actions = Object.keys(rollover).length > 0 ? { rollover, ...rest } : rest;
  return raw;
}

/**
 * Build the body to store for a policy (`{"policy": <body>}` on PUT).
 */
export function toRawPolicy(policy: ILMPolicy): RawPolicyBody {
  const phases: Record<string, RawPhase> = {};
  if (policy.phases.hot) phases.hot = toRawHotPhase(policy.phases.hot);
  if (policy.phases.warm) phases.warm = toRawPhase(policy.phases.warm);
  if (policy.phases.cold) phases.cold = toRawPhase(policy.phases.cold);
  for (const [name, phase] of Object.entries(policy.otherPhases ?? {})) {
    phases[name] = { ...phase };
  }
  if (policy.phases.delete) phases.delete = toRawPhase(policy.phases.delete);

  const body: RawPolicyBody = { ...(policy.extra ?? {}), phases };
  if (policy.meta) {
    body._meta = policy.meta;
  }
  return body;
}

/**
 * Check that phase ages never decrease from hot to delete.
 *
 * A phase without `min_age` counts as 0.
 */
export function checkPhaseOrdering(
  policy: ILMPolicy,
): Result<ILMPolicy, InvalidPhaseOrderingError> {
  let previous: { phase: PhaseName; age: string; ms: number } | undefined;

  for (const name of PHASE_ORDER) {
    const phase = policy.phases[name];
    if (!phase) continue;

    const age = phase.minAge ?? '0ms';
    const parsed = parseDuration(age);
    if (parsed.isErr()) {
      return err(
        new InvalidPhaseOrderingError(policy.name, `${name} phase has an ${parsed.error}`),
      );
    }
    if (previous && parsed.value < previous.ms) {
      return err(
        new InvalidPhaseOrderingError(
          policy.name,
          `${name} phase min_age ${age} is before ${previous.phase} phase min_age ${previous.age}`,
        ),
      );
    }
    previous = { phase: name, age, ms: parsed.value };
  }
  return ok(policy);
}

/**
 * Apply one edit to a policy.
 *
 * Only the targeted phase changes. An age edit sets `min_age` to `<days>d`
 * and keeps the phase's actions; a phase created from scratch gets the
 * default actions. A rollover edit sets or clears the hot phase thresholds
 * (a missing hot phase starts at `0ms`). Ages are checked after age edits.
 *
 * @param current - Stored policy, or undefined to start from an empty one
 * @param name - Policy name
 * @param edit - Edit to apply
 * @returns Result with the new policy, or InvalidPhaseOrderingError
 *
 * @example
 * ```typescript
 * const result = applyPolicyEdit(current, 'logs', { phase: 'delete', days: 30 });
 * if (result.isOk()) {
 *   await cluster.putPolicy('logs', toRawPolicy(result.value));
 * }
 * ```
 */
export function applyPolicyEdit(
  current: ILMPolicy | undefined,
  name: string,
  edit: PolicyEdit,
): Result<ILMPolicy, InvalidPhaseOrderingError> {
  const base: ILMPolicy = current ?? { name, phases: {} };
  const next: ILMPolicy = { ...base, name, phases: { ...base.phases } };

  if (edit.phase === 'rollover') {
    const hot: HotPhase = next.phases.hot
      ? { ...next.phases.hot, actions: { ...next.phases.hot.actions } }
      : { minAge: '0ms', actions: {} };
    if (edit.maxSize === null) {
      delete hot.rolloverMaxSize;
    } else {
      hot.rolloverMaxSize = edit.maxSize;
    }
    if (edit.maxDocs === null) {
      delete hot.rolloverMaxDocs;
    } else {
      hot.rolloverMaxDocs = edit.maxDocs;
    }
    next.phases.hot = hot;
    return ok(next);
  }

  if (!Number.isInteger(edit.days) || edit.days < 0) {
    return err(
      new InvalidPhaseOrderingError(
        name,
        `${edit.phase} age must be a whole number of days (got: ${String(edit.days)})`,
      ),
    );
  }

  const existing = next.phases[edit.phase];
  next.phases[edit.phase] = existing
    ? { ...existing, minAge: `${String(edit.days)}d` }
    : { minAge: `${String(edit.days)}d`, actions: DEFAULT_ACTIONS[edit.phase]() };

  return checkPhaseOrdering(next);
}
