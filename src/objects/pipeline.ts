/**
 * Export/import pipeline for saved objects.
 *
 * Export: resolve target → detect backend → repository export → sink.
 * Import: resolve target → detect backend → decode → reference check →
 * repository import, outcomes in input order.
 */

import { once } from 'events';
import { createReadStream, existsSync, statSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import type { Readable, Writable } from 'stream';
import { glob } from 'glob';
import { withSpan, SpanAttributes } from '../instrumentation';
import { createLogger } from '../logger';
import type { AppConfig } from '../types/config';
import { DanglingReferenceError, DuplicateRecordError, FileSystemError } from '../types/errors';
import type { MissingReference } from '../types/errors';
import type { ExportBatch, ImportOutcome, SavedObjectRecord } from '../types/saved-objects';
import { objectKey } from '../types/saved-objects';
import type { BackendMode } from './backend';
import { decodeContent, decodeNdjson, encodeJsonArray, encodeNdjson } from './codec';
import { mapWithConcurrency } from './pool';
import type { ObjectRepositoryClient } from './repository';
import { failedOutcome } from './repository';
import type { SessionDeps } from './session';
import { openSession } from './session';

const log = createLogger('objects:pipeline');

export type ExportSink =
  | { kind: 'stream'; stream: Writable; format: 'ndjson' | 'json' }
  | { kind: 'files'; directory: string };

export interface ExportOptions {
  /** Target name; the default target when undefined */
  target?: string;
  types?: readonly string[];
  ids?: readonly string[];
  bestEffort?: boolean;
  sink: ExportSink;
}

export interface ExportReport {
  mode: BackendMode;
  batch: ExportBatch;
  missingIds: string[];
  /** True when the session was aborted; the batch holds what was fetched */
  aborted: boolean;
  /** Requested ids never looked up because the session was aborted */
  unfetchedIds: string[];
  warnings: string[];
  /** Written files, for the file-per-object sink */
  files?: string[];
}

export type ImportSource =
  | { kind: 'file'; path: string }
  | { kind: 'directory'; path: string }
  | { kind: 'stream'; stream: Readable };

export interface ImportOptions {
  target?: string;
  source: ImportSource;
  overwrite: boolean;
  /** Only import records of these types; others are reported as skipped */
  types?: readonly string[];
}

export interface ImportReport {
  mode: BackendMode;
  outcomes: ImportOutcome[];
  warnings: string[];
}

/**
 * File name of a record in the file-per-object layout.
 */
export function objectFileName(record: SavedObjectRecord): string {
  const safe = (value: string): string => value.replace(/[/\\:]/g, '_');
  return `${safe(record.type)}-${safe(record.id)}.json`;
}

async function writeToStream(stream: Writable, chunk: string): Promise<void> {
  if (!stream.write(chunk)) {
    await once(stream, 'drain');
  }
}

async function writeStreamSink(
  batch: ExportBatch,
  sink: Extract<ExportSink, { kind: 'stream' }>,
): Promise<void> {
  if (sink.format === 'json') {
    await writeToStream(sink.stream, encodeJsonArray(batch));
    return;
  }
  for await (const line of encodeNdjson(batch)) {
    await writeToStream(sink.stream, line);
  }
}

async function writeFilesSink(
  batch: ExportBatch,
  directory: string,
  concurrency: number,
): Promise<string[]> {
  try {
    await mkdir(directory, { recursive: true });
  } catch (err) {
    throw new FileSystemError(
      `Failed to create export directory: ${directory}`,
      directory,
      'DIRECTORY_CREATE_FAILED',
      err instanceof Error ? err : undefined,
    );
  }

  const results = await mapWithConcurrency(batch, concurrency, async (record) => {
    const filePath = path.join(directory, objectFileName(record));
    try {
      await writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`);
    } catch (err) {
      throw new FileSystemError(
        `Failed to write export file: ${filePath}`,
        filePath,
        'FILE_WRITE_FAILED',
        err instanceof Error ? err : undefined,
      );
    }
    return filePath;
  });

  const files: string[] = [];
  for (const result of results) {
    if (result.status === 'rejected') {
      throw result.reason;
    }
    if (result.status === 'fulfilled') {
      files.push(result.value);
    }
  }
  return files;
}

/**
 * Export saved objects of a target to a stream or to one file per object.
 *
 * Records fetched before the session is aborted are still written; the
 * report says the export was aborted.
 *
 * @param config - Validated application configuration
 * @param options - What to export and where to write it
 * @param deps - Injected dependencies
 * @returns Exported batch, missing ids (best effort) and warnings
 * @throws {PartialExportError} When ids are missing and bestEffort is not set
 */
export async function exportObjects(
  config: AppConfig,
  options: ExportOptions,
  deps: SessionDeps = {},
): Promise<ExportReport> {
  const session = await openSession(config, options.target, deps);
  const { repository, target } = session;

  return withSpan(
    'export_objects',
    {
      [SpanAttributes.TARGET_NAME]: target.name,
      [SpanAttributes.BACKEND_MODE]: repository.mode,
    },
    async () => {
      const { batch, missingIds, aborted, unfetchedIds } = await repository.export({
        types: options.types,
        ids: options.ids,
        bestEffort: options.bestEffort,
      });

      const report: ExportReport = {
        mode: repository.mode,
        batch,
        missingIds,
        aborted,
        unfetchedIds,
        warnings: session.warnings,
      };

      if (options.sink.kind === 'files') {
        report.files = await writeFilesSink(
          batch,
          options.sink.directory,
          config.runtime.concurrency,
        );
      } else {
        await writeStreamSink(batch, options.sink);
      }

      log.info(
        {
          'target.name': target.name,
          'backend.mode': repository.mode,
          'objects.count': batch.length,
        },
        `Exported ${String(batch.length)} saved objects from '${target.name}'`,
      );
      return report;
    },
  );
}

async function readFileRecords(filePath: string): Promise<SavedObjectRecord[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new FileSystemError(
      `Failed to read import file: ${filePath}`,
      filePath,
      'FILE_READ_FAILED',
      err instanceof Error ? err : undefined,
    );
  }
  return decodeContent(text);
}

/**
 * Decode every record of an import source, in source order.
 *
 * NDJSON files are streamed; files starting with '[' or holding a single
 * pretty-printed object are parsed whole. Directories contribute their
 * `*.json` files in name order.
 */
export async function readImportSource(source: ImportSource): Promise<SavedObjectRecord[]> {
  if (source.kind === 'stream') {
    return decodeNdjson(source.stream);
  }

  if (!existsSync(source.path)) {
    throw new FileSystemError(`Import path not found: ${source.path}`, source.path, 'NOT_FOUND');
  }

  if (source.kind === 'directory' || statSync(source.path).isDirectory()) {
    const files = (await glob('*.json', { cwd: source.path, absolute: true, nodir: true })).sort();
    log.debug(
      { 'file.directory': source.path, 'file.count': files.length },
      `Reading ${String(files.length)} files from ${source.path}`,
    );
    const records: SavedObjectRecord[] = [];
    for (const file of files) {
      records.push(...(await readFileRecords(file)));
    }
    return records;
  }

  if (source.path.endsWith('.ndjson')) {
    return decodeNdjson(createReadStream(source.path));
  }
  return readFileRecords(source.path);
}

/**
 * Find references of each record that exist neither in the batch nor in the
 * destination. Destination lookups are memoised and run in the worker pool.
 *
 * @returns Per record: the missing references, or the lookup error
 */
export async function checkReferences(
  records: readonly SavedObjectRecord[],
  repository: ObjectRepositoryClient,
  concurrency: number,
  signal?: AbortSignal,
): Promise<(MissingReference[] | { error: unknown })[]> {
  const inBatch = new Set(records.map((record) => objectKey(record.type, record.id)));
  const lookups = new Map<string, Promise<boolean>>();

  const existsInDestination = (type: string, id: string): Promise<boolean> => {
    const key = objectKey(type, id);
    let lookup = lookups.get(key);
    if (!lookup) {
      lookup = repository.exists(type, id);
      lookups.set(key, lookup);
    }
    return lookup;
  };

  const results = await mapWithConcurrency(
    records,
    concurrency,
    async (record) => {
      const missing: MissingReference[] = [];
      for (const ref of record.references) {
        if (inBatch.has(objectKey(ref.type, ref.id))) {
          continue;
        }
        if (!(await existsInDestination(ref.type, ref.id))) {
          missing.push({ type: ref.type, id: ref.id });
        }
      }
      return missing;
    },
    signal,
  );

  return results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      error: result.status === 'rejected' ? result.reason : new Error('Reference check aborted'),
    };
  });
}

/**
 * Import saved objects into a target.
 *
 * A repeated (type, id) fails with DuplicateRecordError after its first
 * occurrence. Records whose references cannot be resolved fail with
 * DanglingReferenceError, and so do records referencing them; the rest
 * are written. No rollback.
 *
 * @param config - Validated application configuration
 * @param options - Source, overwrite flag and optional type filter
 * @param deps - Injected dependencies
 * @returns One outcome per decoded record, in input order
 * @throws {MalformedRecordError} When the source cannot be decoded
 */
export async function importObjects(
  config: AppConfig,
  options: ImportOptions,
  deps: SessionDeps = {},
): Promise<ImportReport> {
  const records = await readImportSource(options.source);
  const session = await openSession(config, options.target, deps);
  const { repository, target } = session;

  return withSpan(
    'import_objects',
    {
      [SpanAttributes.TARGET_NAME]: target.name,
      [SpanAttributes.BACKEND_MODE]: repository.mode,
      [SpanAttributes.OBJECTS_COUNT]: records.length,
    },
    async () => {
      const outcomes: (ImportOutcome | undefined)[] = records.map(() => undefined);
      const candidates: { record: SavedObjectRecord; index: number }[] = [];
      const seen = new Set<string>();

      for (const [index, record] of records.entries()) {
        const key = objectKey(record.type, record.id);
        if (seen.has(key)) {
          outcomes[index] = failedOutcome(
            record,
            new DuplicateRecordError(record.type, record.id, 'batch'),
          );
        } else if (
          options.types &&
          options.types.length > 0 &&
          !options.types.includes(record.type)
        ) {
          outcomes[index] = { id: record.id, type: record.type, status: 'skipped' };
        } else {
          candidates.push({ record, index });
        }
        seen.add(key);
      }

      const checks = await checkReferences(
        candidates.map((candidate) => candidate.record),
        repository,
        config.runtime.concurrency,
        deps.signal,
      );

      const writable: { record: SavedObjectRecord; index: number }[] = [];
      const rejected: MissingReference[] = [];
      for (const [position, candidate] of candidates.entries()) {
        const check = checks[position];
        if (check === undefined) {
          continue;
        }
        if ('error' in check) {
          rejected.push({ type: candidate.record.type, id: candidate.record.id });
          outcomes[candidate.index] = failedOutcome(candidate.record, check.error);
        } else if (check.length > 0) {
          rejected.push({ type: candidate.record.type, id: candidate.record.id });
          const error = new DanglingReferenceError(
            candidate.record.type,
            candidate.record.id,
            check,
          );
          log.warn(
            { 'saved_object.type': candidate.record.type, 'saved_object.id': candidate.record.id },
            error.message,
          );
          outcomes[candidate.index] = failedOutcome(candidate.record, error);
        } else {
          writable.push(candidate);
        }
      }

      const written = await repository.importBatch(
        writable.map((entry) => entry.record),
        options.overwrite,
        { failed: rejected },
      );
      for (const [position, entry] of writable.entries()) {
        outcomes[entry.index] = written[position];
      }

      const merged: ImportOutcome[] = [];
      for (const [index, record] of records.entries()) {
        merged.push(outcomes[index] ?? failedOutcome(record, new Error('Record was not processed')));
      }

      const failed = merged.filter((outcome) => outcome.status === 'failed').length;
      log.info(
        {
          'target.name': target.name,
          'backend.mode': repository.mode,
          'objects.count': merged.length,
          'objects.failed': failed,
        },
        `Imported ${String(merged.length - failed)} of ${String(merged.length)} saved objects into '${target.name}'`,
      );

      return { mode: repository.mode, outcomes: merged, warnings: session.warnings };
    },
  );
}
