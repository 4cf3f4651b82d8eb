/**
 * Backend-agnostic saved object repository.
 *
 * One client per session, over the backend chosen by the capability
 * detector. Reads, existence lookups and deletes are retried on transient
 * failures; writes are not.
 */

import { withSpan, SpanAttributes } from '../instrumentation';
import { createLogger } from '../logger';
import {
  DanglingReferenceError,
  DuplicateRecordError,
  InvalidRecordError,
  NotFoundError,
  PartialExportError,
  toErrorPayload,
} from '../types/errors';
import type { MissingReference } from '../types/errors';
import type { ExportBatch, ImportOutcome, SavedObjectRecord } from '../types/saved-objects';
import { SAVED_OBJECT_TYPES, checkSavedObject, objectKey } from '../types/saved-objects';
import type { BackendMode, PageCursor, SavedObjectBackend } from './backend';
import { mapWithConcurrency } from './pool';
import { withRetry } from './retry';

const log = createLogger('objects:repository');

/** Entries requested per list page */
export const PAGE_SIZE = 100;

export interface RepositoryOptions {
  /** List page size (default: {@link PAGE_SIZE}) */
  pageSize?: number;
  /** Worker pool size for per-id fan-out (default: 4) */
  concurrency?: number;
  /** Retries for idempotent requests (default: 2) */
  retries?: number;
  /** Base backoff delay in milliseconds (default: 300) */
  retryBaseDelayMs?: number;
  /** Stops issuing new requests once aborted */
  signal?: AbortSignal;
}

export interface ExportRequest {
  /** Types to include; all managed types when empty */
  types?: readonly string[];
  /** Export only these ids; everything when empty */
  ids?: readonly string[];
  /** Return what was found instead of failing on missing ids */
  bestEffort?: boolean;
}

export interface ExportResult {
  batch: ExportBatch;
  /** Requested ids that were not found (best effort or aborted) */
  missingIds: string[];
  /** True when the session was aborted before the export completed */
  aborted: boolean;
  /** Requested ids never looked up because the session was aborted */
  unfetchedIds: string[];
}

export interface ImportBatchOptions {
  /**
   * Objects of the same import that already failed. Records referencing
   * them fail too unless the object exists in the destination.
   */
  failed?: readonly MissingReference[];
}

/** An earlier record of the batch that a record references */
interface BatchDependency {
  ref: MissingReference;
  outcome: Promise<ImportOutcome>;
}

function describeFailure(error: unknown): { kind: string; message: string } {
  const payload = toErrorPayload(error);
  return { kind: payload.kind, message: payload.message };
}

/**
 * Failed outcome of a record, carrying the error kind and message.
 */
export function failedOutcome(
  record: Pick<SavedObjectRecord, 'type' | 'id'>,
  error: unknown,
): ImportOutcome {
  return {
    id: typeof record.id === 'string' ? record.id : '',
    type: typeof record.type === 'string' ? record.type : '',
    status: 'failed',
    error: describeFailure(error),
  };
}

export class ObjectRepositoryClient {
  private readonly pageSize: number;
  private readonly concurrency: number;
  private readonly retries: number;
  private readonly retryBaseDelayMs?: number;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly backend: SavedObjectBackend,
    options: RepositoryOptions = {},
  ) {
    this.pageSize = options.pageSize ?? PAGE_SIZE;
    this.concurrency = options.concurrency ?? 4;
    this.retries = options.retries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs;
    this.signal = options.signal;
  }

  get mode(): BackendMode {
    return this.backend.mode;
  }

  private retry<T>(action: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(action, fn, {
      retries: this.retries,
      baseDelayMs: this.retryBaseDelayMs,
      signal: this.signal,
    });
  }

  /**
   * Stream every saved object of the given types, page by page.
   *
   * Each call has its own cursor. Stops on an empty page or once the
   * reported total is reached, and when the session is aborted.
   *
   * @param types - Types to list (default: all managed types)
   * @throws {DuplicateRecordError} When the backend returns a (type, id) twice
   */
  async *list(types?: readonly string[]): AsyncGenerator<SavedObjectRecord> {
    const wanted = types && types.length > 0 ? types : SAVED_OBJECT_TYPES;
    const seen = new Set<string>();
    let scanned = 0;
    let cursor: PageCursor | undefined;

    try {
      for (let page = 0; !this.signal?.aborted; page++) {
        const current = cursor;
        const result = await this.retry('list_page', () =>
          this.backend.findPage(wanted, current, this.pageSize),
        );
        cursor = result.next;
        if (result.scanned === 0) {
          return;
        }
        log.debug(
          { 'backend.mode': this.mode, 'page.number': page, 'page.size': result.scanned },
          `Listed page ${String(page)} (${String(result.records.length)} records)`,
        );

        for (const record of result.records) {
          const key = objectKey(record.type, record.id);
          if (seen.has(key)) {
            throw new DuplicateRecordError(record.type, record.id);
          }
          seen.add(key);
          yield record;
        }

        scanned += result.scanned;
        if (scanned >= result.total || cursor === undefined) {
          return;
        }
      }
    } finally {
      if (cursor !== undefined) {
        await this.closeCursor(cursor);
      }
    }
  }

  private async closeCursor(cursor: PageCursor): Promise<void> {
    try {
      await this.backend.closeCursor?.(cursor);
    } catch (error) {
      log.warn(
        { 'backend.mode': this.mode, ...describeFailure(error) },
        'Failed to release the listing cursor',
      );
    }
  }

  /**
   * Look up a record without failing when it is missing.
   */
  async find(type: string, id: string): Promise<SavedObjectRecord | undefined> {
    return this.retry('get', () => this.backend.get(type, id));
  }

  /**
   * @throws {NotFoundError} When the object does not exist
   */
  async get(type: string, id: string): Promise<SavedObjectRecord> {
    const record = await this.find(type, id);
    if (!record) {
      throw new NotFoundError(type, id);
    }
    return record;
  }

  async exists(type: string, id: string): Promise<boolean> {
    return (await this.find(type, id)) !== undefined;
  }

  private async findById(
    id: string,
    types: readonly string[],
  ): Promise<SavedObjectRecord | undefined> {
    for (const type of types) {
      const record = await this.find(type, id);
      if (record) {
        return record;
      }
    }
    return undefined;
  }

  /**
   * Export saved objects.
   *
   * Without ids this is a full listing. With ids, each id is looked up in the
   * worker pool against the requested types (or every managed type), keeping
   * the order of the ids. An aborted session returns what was fetched so
   * far with `aborted` set.
   *
   * @throws {PartialExportError} When ids are missing and bestEffort is not set
   */
  async export(request: ExportRequest = {}): Promise<ExportResult> {
    const types = request.types && request.types.length > 0 ? request.types : SAVED_OBJECT_TYPES;

    if (!request.ids || request.ids.length === 0) {
      return withSpan(
        'repository_export',
        { [SpanAttributes.BACKEND_MODE]: this.mode },
        async () => {
          const batch: ExportBatch = [];
          for await (const record of this.list(types)) {
            batch.push(record);
          }
          return { batch, missingIds: [], aborted: this.signal?.aborted === true, unfetchedIds: [] };
        },
      );
    }

    const ids = [...new Set(request.ids)];
    return withSpan(
      'repository_export_ids',
      { [SpanAttributes.BACKEND_MODE]: this.mode, [SpanAttributes.OBJECTS_COUNT]: ids.length },
      async () => {
        const results = await mapWithConcurrency(
          ids,
          this.concurrency,
          (id) => this.findById(id, types),
          this.signal,
        );

        const batch: ExportBatch = [];
        const missingIds: string[] = [];
        const unfetchedIds: string[] = [];
        for (const [index, result] of results.entries()) {
          const id = ids[index] ?? '';
          if (result.status === 'rejected') {
            throw result.reason;
          }
          if (result.status === 'skipped') {
            unfetchedIds.push(id);
          } else if (result.value) {
            batch.push(result.value);
          } else {
            missingIds.push(id);
          }
        }

        const aborted = unfetchedIds.length > 0;
        if (aborted) {
          log.warn(
            { 'objects.unfetched': unfetchedIds },
            `Export aborted before fetching: ${unfetchedIds.join(', ')}`,
          );
        }
        if (missingIds.length > 0) {
          if (!request.bestEffort && !aborted) {
            throw new PartialExportError(missingIds, batch);
          }
          log.warn(
            { 'objects.missing': missingIds },
            `Objects not found: ${missingIds.join(', ')}`,
          );
        }
        return { batch, missingIds, aborted, unfetchedIds };
      },
    );
  }

  private async importOne(
    record: SavedObjectRecord,
    overwrite: boolean,
    dependencies: readonly BatchDependency[],
  ): Promise<ImportOutcome> {
    const checked = checkSavedObject(record);
    if (checked.isErr()) {
      return failedOutcome(record, new InvalidRecordError(`Invalid saved object: ${checked.error}`));
    }

    const valid = checked.value;
    try {
      const missing = await this.failedReferences(dependencies);
      if (missing.length > 0) {
        const error = new DanglingReferenceError(valid.type, valid.id, missing);
        log.warn({ 'saved_object.type': valid.type, 'saved_object.id': valid.id }, error.message);
        return failedOutcome(valid, error);
      }

      const existed = await this.exists(valid.type, valid.id);
      if (existed && !overwrite) {
        return { id: valid.id, type: valid.type, status: 'skipped' };
      }
      await this.backend.write(valid);
      return { id: valid.id, type: valid.type, status: existed ? 'overwritten' : 'created' };
    } catch (error) {
      log.warn(
        { 'saved_object.type': valid.type, 'saved_object.id': valid.id, ...describeFailure(error) },
        `Import of ${valid.type}:${valid.id} failed`,
      );
      return failedOutcome(valid, error);
    }
  }

  /**
   * Wait for the earlier batch records a record references and return those
   * that failed and do not exist in the destination either.
   */
  private async failedReferences(
    dependencies: readonly BatchDependency[],
  ): Promise<MissingReference[]> {
    const missing: MissingReference[] = [];
    for (const { ref, outcome } of dependencies) {
      if ((await outcome).status !== 'failed') {
        continue;
      }
      if (!(await this.exists(ref.type, ref.id))) {
        missing.push(ref);
      }
    }
    return missing;
  }

  /**
   * Write a batch of records.
   *
   * Existing objects are skipped unless `overwrite` is set. Invalid records,
   * repeated (type, id) pairs and backend failures become `failed`
   * outcomes; the batch continues. A record is written only after the
   * earlier records of the batch it references, and fails with
   * DanglingReferenceError when one of them failed and the destination
   * does not hold it either. Records are never reordered.
   *
   * @returns One outcome per input record, in input order
   */
  async importBatch(
    batch: readonly SavedObjectRecord[],
    overwrite: boolean,
    options: ImportBatchOptions = {},
  ): Promise<ImportOutcome[]> {
    const settled = new Map<string, Promise<ImportOutcome>>();
    for (const ref of options.failed ?? []) {
      const outcome: ImportOutcome = { id: ref.id, type: ref.type, status: 'failed' };
      settled.set(objectKey(ref.type, ref.id), Promise.resolve(outcome));
    }
    const firstIndex = new Map<string, number>();
    for (const [index, record] of batch.entries()) {
      const key = objectKey(record.type, record.id);
      if (!firstIndex.has(key)) {
        firstIndex.set(key, index);
      }
    }

    const results = await mapWithConcurrency(
      batch,
      this.concurrency,
      (record, index) => {
        const key = objectKey(record.type, record.id);
        if (firstIndex.get(key) !== index) {
          return Promise.resolve(
            failedOutcome(record, new DuplicateRecordError(record.type, record.id, 'batch')),
          );
        }
        // Only records registered so far: waiting on a later one could deadlock
        const dependencies: BatchDependency[] = [];
        for (const ref of record.references) {
          const outcome = settled.get(objectKey(ref.type, ref.id));
          if (outcome) {
            dependencies.push({ ref: { type: ref.type, id: ref.id }, outcome });
          }
        }
        const outcome = this.importOne(record, overwrite, dependencies);
        settled.set(key, outcome);
        return outcome;
      },
      this.signal,
    );

    return results.map((result, index): ImportOutcome => {
      if (result.status === 'fulfilled') {
        return result.value;
      }
      const record = batch[index];
      return {
        id: record?.id ?? '',
        type: record?.type ?? '',
        status: 'failed',
        error:
          result.status === 'rejected'
            ? describeFailure(result.reason)
            : { kind: 'AbortError', message: 'Import aborted before this record was written' },
      };
    });
  }

  /**
   * Delete a saved object. Deleting an absent object succeeds.
   *
   * @returns True when an object was deleted, false when none existed
   */
  async delete(type: string, id: string): Promise<boolean> {
    const deleted = await this.retry('delete', () => this.backend.delete(type, id));
    log.info(
      { 'saved_object.type': type, 'saved_object.id': id, 'backend.mode': this.mode },
      deleted ? `Deleted ${type}:${id}` : `${type}:${id} did not exist`,
    );
    return deleted;
  }
}
