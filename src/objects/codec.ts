/**
 * NDJSON codec for saved objects.
 *
 * Export files are either NDJSON (one saved object per line, the format of
 * the management API) or a flat pretty-printed JSON array. Both decode to the
 * same records.
 */

import type { Readable } from 'stream';
import split from 'split2';
import { createLogger } from '../logger';
import { MalformedRecordError } from '../types/errors';
import type { SavedObjectRecord } from '../types/saved-objects';
import { checkSavedObject, isExportMetadata } from '../types/saved-objects';

const log = createLogger('objects:codec');

function toPlain(record: SavedObjectRecord): SavedObjectRecord {
  return {
    id: record.id,
    type: record.type,
    attributes: record.attributes,
    references: record.references,
  };
}

/**
 * Encode records as NDJSON lines, in input order.
 *
 * @param records - Records to encode
 * @yields One JSON object followed by '\n' per record
 */
export async function* encodeNdjson(
  records: Iterable<SavedObjectRecord> | AsyncIterable<SavedObjectRecord>,
): AsyncGenerator<string> {
  for await (const record of records) {
    yield `${JSON.stringify(toPlain(record))}\n`;
  }
}

/**
 * Encode records as a flat, pretty-printed JSON array.
 */
export function encodeJsonArray(records: readonly SavedObjectRecord[]): string {
  return `${JSON.stringify(records.map(toPlain), null, 2)}\n`;
}

/**
 * Decode one logical line.
 *
 * @param line - Raw line
 * @param lineNumber - 1-based line number for errors
 * @returns The record, or null for blank and metadata lines
 * @throws {MalformedRecordError} On invalid JSON or a value that is not a saved object
 */
function decodeLine(line: string, lineNumber: number): SavedObjectRecord | null {
  if (line.trim() === '') return null;

  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (err) {
    throw new MalformedRecordError(
      lineNumber,
      'invalid JSON',
      err instanceof Error ? err : undefined,
    );
  }
  return decodeValue(value, lineNumber);
}

function decodeValue(value: unknown, lineNumber: number): SavedObjectRecord | null {
  if (isExportMetadata(value)) {
    log.debug({ 'file.line': lineNumber }, 'Skipping export metadata line');
    return null;
  }
  const checked = checkSavedObject(value);
  if (checked.isErr()) {
    throw new MalformedRecordError(lineNumber, checked.error);
  }
  return checked.value;
}

/**
 * Decode an NDJSON stream line by line.
 *
 * Blank lines and export metadata lines are skipped. The first malformed
 * line rejects the whole decode and stops reading the stream.
 *
 * @param input - Readable NDJSON stream
 * @returns Records in stream order
 */
export async function decodeNdjson(input: Readable): Promise<SavedObjectRecord[]> {
  const records: SavedObjectRecord[] = [];
  let lineNumber = 0;

  return new Promise<SavedObjectRecord[]>((resolve, reject) => {
    const lines = input.pipe(split());
    const fail = (err: unknown): void => {
      input.unpipe(lines);
      input.destroy();
      lines.destroy();
      reject(err instanceof Error ? err : new Error(String(err)));
    };

    input.on('error', fail);
    lines
      .on('data', (line: string) => {
        lineNumber++;
        try {
          const record = decodeLine(line, lineNumber);
          if (record) {
            records.push(record);
          }
        } catch (err) {
          fail(err);
        }
      })
      .on('error', fail)
      .on('end', () => {
        resolve(records);
      });
  });
}

/**
 * Decode the full text of an export file.
 *
 * - Text starting with '[' is the flat JSON array form
 * - Text that parses as one JSON value is a single record (pretty-printed
 *   per-object files, or a one-line NDJSON file)
 * - Anything else is decoded as NDJSON
 *
 * @param text - File content
 * @returns Records in file order
 * @throws {MalformedRecordError} On the first malformed entry
 */
export function decodeContent(text: string): SavedObjectRecord[] {
  const trimmed = text.trim();
  if (trimmed === '') return [];

  if (trimmed.startsWith('[')) {
    let values: unknown;
    try {
      values = JSON.parse(trimmed);
    } catch (err) {
      throw new MalformedRecordError(
        1,
        'invalid JSON array',
        err instanceof Error ? err : undefined,
      );
    }
    if (!Array.isArray(values)) {
      throw new MalformedRecordError(1, 'expected a JSON array');
    }
    const records: SavedObjectRecord[] = [];
    for (const [index, value] of values.entries()) {
      const record = decodeValue(value, index + 1);
      if (record) records.push(record);
    }
    return records;
  }

  let single: unknown;
  let isSingle = true;
  try {
    single = JSON.parse(trimmed);
  } catch {
    isSingle = false;
  }
  if (isSingle) {
    const record = decodeValue(single, 1);
    return record ? [record] : [];
  }

  const records: SavedObjectRecord[] = [];
  for (const [index, line] of text.split(/\r?\n/).entries()) {
    const record = decodeLine(line, index + 1);
    if (record) records.push(record);
  }
  return records;
}
