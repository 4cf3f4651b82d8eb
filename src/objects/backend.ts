/**
 * Storage strategy behind the object repository.
 *
 * Two implementations exist: the management API of the dashboards
 * application ({@link ModernApiBackend}) and direct access to the internal
 * saved-objects index ({@link LegacyIndexBackend}). The strategy is picked
 * once per session by the capability detector.
 */

import type { SavedObjectRecord } from '../types/saved-objects';

export type BackendMode = 'ModernApi' | 'LegacyIndex';

/** Position of a listing, owned by the backend that issued it */
export type PageCursor = string;

export interface SavedObjectPage {
  /** Valid records of this page, in backend order */
  records: SavedObjectRecord[];
  /** Entries the backend returned for this page, including unreadable ones */
  scanned: number;
  /** Total matching entries reported by the backend */
  total: number;
  /** Cursor of the following page; absent when there is none */
  next?: PageCursor;
}

export interface SavedObjectBackend {
  readonly mode: BackendMode;
  /**
   * Fetch one page.
   *
   * @param types - Types to include (at least one)
   * @param cursor - `next` of the previous page; undefined for the first page
   * @param perPage - Page size
   */
  findPage(
    types: readonly string[],
    cursor: PageCursor | undefined,
    perPage: number,
  ): Promise<SavedObjectPage>;
  /** Release server-side state of a listing that stops before its last page */
  closeCursor?(cursor: PageCursor): Promise<void>;
  /** The record, or undefined when it does not exist */
  get(type: string, id: string): Promise<SavedObjectRecord | undefined>;
  /** Create or replace the record */
  write(record: SavedObjectRecord): Promise<void>;
  /** True when something was deleted, false when the object did not exist */
  delete(type: string, id: string): Promise<boolean>;
}
