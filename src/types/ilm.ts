/**
 * Index lifecycle management types.
 *
 * `Raw*` types mirror the cluster's `_ilm` JSON; {@link ILMPolicy} is the
 * typed model the composer edits.
 */

import { isRecord } from '../utils';

export type PhaseName = 'hot' | 'warm' | 'cold' | 'delete';

export const PHASE_ORDER: readonly PhaseName[] = ['hot', 'warm', 'cold', 'delete'];

/** Phase as stored by the cluster */
export interface RawPhase {
  min_age?: string;
  actions?: Record<string, unknown>;
  [key: string]: unknown;
}

/** Policy body as stored by the cluster (`PUT _ilm/policy/<name>` payload) */
export interface RawPolicyBody {
  phases?: Record<string, RawPhase>;
  _meta?: Record<string, unknown>;
  [key: string]: unknown;
}

/**
 * One lifecycle phase. `actions` holds every action the phase carries so a
 * round trip through the composer never drops settings.
 */
export interface PolicyPhase {
  /** Phase entry age, e.g. '30d'; absent means '0ms' */
  minAge?: string;
  actions: Record<string, unknown>;
  /** Unknown phase fields, kept as is */
  extra?: Record<string, unknown>;
}

/**
 * Hot phase. The rollover thresholds are lifted out of `actions.rollover`;
 * any other rollover settings stay in `actions`.
 */
export interface HotPhase extends PolicyPhase {
  /** `max_primary_shard_size`, e.g. '50gb' */
  rolloverMaxSize?: string;
  /** `max_docs` */
  rolloverMaxDocs?: number;
}

export interface ILMPolicy {
  name: string;
  phases: {
    hot?: HotPhase;
    warm?: PolicyPhase;
    cold?: PolicyPhase;
    delete?: PolicyPhase;
  };
  /** Phases the composer does not edit (e.g. `frozen`), kept as stored */
  otherPhases?: Record<string, RawPhase>;
  /** `_meta` of the policy, kept as is */
  meta?: Record<string, unknown>;
  /** Unknown top-level policy fields, kept as is */
  extra?: Record<string, unknown>;
}

/** Age edit for warm, cold or delete */
export interface AgeEdit {
  phase: 'warm' | 'cold' | 'delete';
  days: number;
}

/** Rollover edit for the hot phase; null clears a threshold */
export interface RolloverEdit {
  phase: 'rollover';
  maxSize: string | null;
  maxDocs: number | null;
}

export type PolicyEdit = AgeEdit | RolloverEdit;

/** Lifecycle state of one index as reported by `_ilm/explain` */
export interface LifecycleExplainEntry {
  index: string;
  managed: boolean;
  policy?: string;
  phase?: string;
  age?: string;
  lifecycleDateMillis?: number;
}

/** Row of the `ilm info` table */
export interface LifecycleRow {
  index: string;
  policy: string;
  phase: string;
  age: string;
  sizeBytes: number;
  warmAt?: Date;
  coldAt?: Date;
  deleteAt?: Date;
}

function parseRawPhase(raw: unknown): RawPhase | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const { min_age: minAge, actions, ...rest } = raw;
  const phase: RawPhase = { ...rest };
  if (typeof minAge === 'string') {
    phase.min_age = minAge;
  }
  if (isRecord(actions)) {
    phase.actions = actions;
  }
  return phase;
}

/**
 * Narrow a policy body returned by the cluster.
 *
 * @param raw - Value of `<name>.policy` in a `GET _ilm/policy` response
 * @returns Policy body, or undefined when it is not an object
 */
export function parseRawPolicy(raw: unknown): RawPolicyBody | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const { phases, _meta: meta, ...rest } = raw;
  const body: RawPolicyBody = { ...rest, phases: {} };
  if (isRecord(phases)) {
    const parsed: Record<string, RawPhase> = {};
    for (const [name, value] of Object.entries(phases)) {
      const phase = parseRawPhase(value);
      if (phase) {
        parsed[name] = phase;
      }
    }
    body.phases = parsed;
  }
  if (isRecord(meta)) {
    body._meta = meta;
  }
  return body;
}
