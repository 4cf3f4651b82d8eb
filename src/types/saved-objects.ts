/**
 * Type definitions for saved objects of the dashboards application.
 *
 * Covers both storage shapes handled by dashsync:
 * - The management API (`/api/saved_objects/...`), used when the dashboards
 *   application exposes it
 * - Raw documents of the internal saved-objects index (`.kibana/_doc/<type>:<id>`),
 *   used as legacy fallback
 *
 * Inside the engine every object is a {@link SavedObjectRecord}; the backends
 * translate at their boundary.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { isRecord } from '../utils';

/**
 * Saved object types managed by the CLI namespaces.
 */
export const SAVED_OBJECT_TYPES = [
  'dashboard',
  'visualization',
  'search',
  'index-pattern',
  'lens',
] as const;

/**
 * Reference to another saved object.
 * Used to establish relationships between saved objects.
 */
export interface SavedObjectReference {
  /** The type of the referenced saved object (e.g., 'index-pattern', 'dashboard') */
  type: string;
  /** The unique identifier of the referenced saved object */
  id: string;
  /** A name to identify this reference within the parent object */
  name: string;
}

/**
 * Backend-independent saved object.
 *
 * `(type, id)` is the identity. Attributes are opaque to the engine.
 */
export interface SavedObjectRecord {
  id: string;
  type: string;
  attributes: Record<string, unknown>;
  references: SavedObjectReference[];
}

/**
 * Ordered records of one export, in API order.
 */
export type ExportBatch = SavedObjectRecord[];

export type ImportStatus = 'created' | 'overwritten' | 'skipped' | 'failed';

/**
 * Result of importing one record. One outcome per input record, in input order.
 */
export interface ImportOutcome {
  id: string;
  type: string;
  status: ImportStatus;
  /** Error kind and message, present only for `failed` */
  error?: {
    kind: string;
    message: string;
  };
}

/**
 * Response from a saved objects find/search operation.
 * GET /api/saved_objects/_find
 */
export interface FindResponse {
  /** Array of saved objects matching the search criteria */
  saved_objects: unknown[];
  /** Total number of matching objects (across all pages) */
  total: number;
  /** Number of results per page */
  per_page?: number;
  /** Current page number (1-indexed) */
  page?: number;
}

/**
 * Document source of a saved object in the internal index.
 *
 * The attributes live under a key named after the type, e.g.
 * `{ "type": "dashboard", "dashboard": { "title": ... }, "references": [] }`.
 */
export interface LegacySavedObjectSource {
  type: string;
  references?: SavedObjectReference[];
  [typeKey: string]: unknown;
}

/**
 * Metadata line of an export file.
 *
 * The management API appends `{exportedCount, missingRefCount, ...}`; older
 * exports start with an `{_index_pattern_map: {...}}` line. Neither is a record.
 */
export type ExportMetadata =
  | { exportedCount: number; missingRefCount?: number }
  | { _index_pattern_map: Record<string, unknown> };

/**
 * Type guard to check if an object is export metadata.
 *
 * @param obj - Object to check
 * @returns True if the object is ExportMetadata
 */
export function isExportMetadata(obj: unknown): obj is ExportMetadata {
  if (!isRecord(obj)) {
    return false;
  }
  return typeof obj.exportedCount === 'number' || isRecord(obj._index_pattern_map);
}

/**
 * Type guard for the find response of the management API.
 */
export function isFindResponse(body: unknown): body is FindResponse {
  return isRecord(body) && Array.isArray(body.saved_objects) && typeof body.total === 'number';
}

function checkReference(value: unknown, index: number): Result<SavedObjectReference, string> {
  if (!isRecord(value)) {
    return err(`references[${String(index)}] is not an object`);
  }
  const { type, id, name } = value;
  if (typeof type !== 'string' || type === '' || typeof id !== 'string' || id === '') {
    return err(`references[${String(index)}] needs a non-empty type and id`);
  }
  return ok({ type, id, name: typeof name === 'string' ? name : '' });
}

/**
 * Checks that an unknown value is a structurally valid saved object and
 * normalizes it to a {@link SavedObjectRecord}.
 *
 * Required: non-empty string `id` and `type`, object `attributes`. Missing
 * `references` become an empty list. Extra fields (version, updated_at, ...)
 * are dropped.
 *
 * @param value - Decoded JSON value
 * @returns Result with the record, or the reason it is invalid
 */
export function checkSavedObject(value: unknown): Result<SavedObjectRecord, string> {
  if (!isRecord(value)) {
    return err('not a JSON object');
  }
  const { id, type, attributes, references } = value;
  if (typeof id !== 'string' || id === '') {
    return err('missing string field "id"');
  }
  if (typeof type !== 'string' || type === '') {
    return err('missing string field "type"');
  }
  if (!isRecord(attributes)) {
    return err('missing object field "attributes"');
  }
  let rawRefs: unknown[] = [];
  if (Array.isArray(references)) {
    rawRefs = references;
  } else if (references !== undefined) {
    return err('field "references" must be an array');
  }

  const refs: SavedObjectReference[] = [];
  for (const [index, ref] of rawRefs.entries()) {
    const checked = checkReference(ref, index);
    if (checked.isErr()) {
      return err(checked.error);
    }
    refs.push(checked.value);
  }

  return ok({ id, type, attributes, references: refs });
}

/**
 * Reads the display title of a record, falling back to its id.
 */
export function recordTitle(record: SavedObjectRecord): string {
  const title = record.attributes.title;
  return typeof title === 'string' && title !== '' ? title : record.id;
}

/**
 * Stable identity key for a record or reference.
 */
export function objectKey(type: string, id: string): string {
  return `${type}:${id}`;
}
