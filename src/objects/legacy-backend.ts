import { createLogger } from '../logger';
import type { ClusterApi } from '../transport/cluster';
import type { LegacySavedObjectSource, SavedObjectRecord } from '../types/saved-objects';
import { checkSavedObject } from '../types/saved-objects';
import { isRecord } from '../utils';
import type { BackendMode, PageCursor, SavedObjectBackend, SavedObjectPage } from './backend';

const log = createLogger('objects:legacy');

/** How long the cluster keeps a listing cursor between two pages */
const SCROLL_KEEP_ALIVE = '2m';

/**
 * Document id of a saved object in the internal index.
 */
export function legacyDocumentId(type: string, id: string): string {
  return `${type}:${id}`;
}

/**
 * Build the index document of a record.
 *
 * @example
 * ```typescript
 * toLegacySource({ id: 'a', type: 'dashboard', attributes: { title: 'A' }, references: [] });
 * // { type: 'dashboard', dashboard: { title: 'A' }, references: [] }
 * ```
 */
export function toLegacySource(record: SavedObjectRecord): LegacySavedObjectSource {
  return {
    type: record.type,
    [record.type]: record.attributes,
    references: record.references,
  };
}

/**
 * Read a record back from an index document.
 *
 * @param documentId - `_id` of the document (`<type>:<id>`)
 * @param source - `_source` of the document
 * @returns The record, or the reason the document is unreadable
 */
export function fromLegacyDocument(
  documentId: string,
  source: unknown,
): { record: SavedObjectRecord } | { reason: string } {
  if (!isRecord(source) || typeof source.type !== 'string') {
    return { reason: 'document has no string "type" field' };
  }
  const type = source.type;
  const prefix = `${type}:`;
  const id = documentId.startsWith(prefix) ? documentId.slice(prefix.length) : documentId;

  const checked = checkSavedObject({
    id,
    type,
    attributes: source[type],
    references: source.references ?? [],
  });
  return checked.isOk() ? { record: checked.value } : { reason: checked.error };
}

/**
 * Saved objects stored directly in the internal index of the dashboards
 * application (`.kibana` unless configured otherwise).
 *
 * Documents use `_id = "<type>:<id>"` and keep the attributes under a key
 * named after the type.
 */
export class LegacyIndexBackend implements SavedObjectBackend {
  readonly mode: BackendMode = 'LegacyIndex';

  constructor(
    private readonly cluster: ClusterApi,
    private readonly index: string,
  ) {}

  /**
   * Pages through a scrolled search, so listings are not bounded by the
   * index's result window. The cursor is the scroll id.
   */
  async findPage(
    types: readonly string[],
    cursor: PageCursor | undefined,
    perPage: number,
  ): Promise<SavedObjectPage> {
    const result =
      cursor === undefined
        ? await this.cluster.openScroll(this.index, {
            size: perPage,
            keepAlive: SCROLL_KEEP_ALIVE,
            types,
          })
        : await this.cluster.continueScroll(cursor, SCROLL_KEEP_ALIVE);

    let next = result.scrollId;
    if (next !== undefined && result.hits.length === 0) {
      await this.cluster.clearScroll(next);
      next = undefined;
    }

    const records: SavedObjectRecord[] = [];
    for (const hit of result.hits) {
      const decoded = fromLegacyDocument(hit.id, hit.source);
      if ('reason' in decoded) {
        log.warn(
          { 'elasticsearch.index': this.index, 'document.id': hit.id },
          `Skipping unreadable document ${hit.id}: ${decoded.reason}`,
        );
        continue;
      }
      records.push(decoded.record);
    }
    return { records, scanned: result.hits.length, total: result.total, next };
  }

  async closeCursor(cursor: PageCursor): Promise<void> {
    await this.cluster.clearScroll(cursor);
  }

  async get(type: string, id: string): Promise<SavedObjectRecord | undefined> {
    const documentId = legacyDocumentId(type, id);
    const source = await this.cluster.getDocument(this.index, documentId);
    if (source === undefined) {
      return undefined;
    }
    const decoded = fromLegacyDocument(documentId, source);
    if ('reason' in decoded) {
      log.warn(
        { 'elasticsearch.index': this.index, 'document.id': documentId },
        `Document ${documentId} is unreadable: ${decoded.reason}`,
      );
      return undefined;
    }
    return decoded.record.type === type ? decoded.record : undefined;
  }

  async write(record: SavedObjectRecord): Promise<void> {
    await this.cluster.indexDocument(
      this.index,
      legacyDocumentId(record.type, record.id),
      toLegacySource(record),
    );
  }

  async delete(type: string, id: string): Promise<boolean> {
    return this.cluster.deleteDocument(this.index, legacyDocumentId(type, id));
  }
}
