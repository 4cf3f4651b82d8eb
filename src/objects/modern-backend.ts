import { createLogger } from '../logger';
import type { DashboardsHttp } from '../transport/http';
import { assertOk } from '../transport/http';
import { RequestError } from '../types/errors';
import type { SavedObjectRecord } from '../types/saved-objects';
import { checkSavedObject, isFindResponse } from '../types/saved-objects';
import type { BackendMode, PageCursor, SavedObjectBackend, SavedObjectPage } from './backend';

const log = createLogger('objects:modern');

function objectPath(type: string, id: string): string {
  return `/api/saved_objects/${encodeURIComponent(type)}/${encodeURIComponent(id)}`;
}

/**
 * Saved objects through the dashboards management API.
 *
 * - list: `GET /api/saved_objects/_find?type=..&page=..&per_page=..`
 * - get: `GET /api/saved_objects/<type>/<id>`
 * - write: `POST /api/saved_objects/<type>/<id>?overwrite=true`
 * - delete: `DELETE /api/saved_objects/<type>/<id>`
 */
export class ModernApiBackend implements SavedObjectBackend {
  readonly mode: BackendMode = 'ModernApi';

  constructor(private readonly http: DashboardsHttp) {}

  /** The cursor is the 1-based page number */
  async findPage(
    types: readonly string[],
    cursor: PageCursor | undefined,
    perPage: number,
  ): Promise<SavedObjectPage> {
    const page = cursor === undefined ? 1 : Number(cursor);
    const response = await this.http.request('GET', '/api/saved_objects/_find', {
      query: { type: [...types], page: String(page), per_page: String(perPage) },
    });
    assertOk(response, 'List saved objects');

    if (!isFindResponse(response.body)) {
      throw new RequestError(
        'Unexpected response from saved objects _find',
        response.url,
        response.status,
        response.text,
      );
    }

    const records: SavedObjectRecord[] = [];
    for (const raw of response.body.saved_objects) {
      const checked = checkSavedObject(raw);
      if (checked.isErr()) {
        log.warn(
          { 'url.full': response.url },
          `Skipping unreadable saved object: ${checked.error}`,
        );
        continue;
      }
      records.push(checked.value);
    }
    return {
      records,
      scanned: response.body.saved_objects.length,
      total: response.body.total,
      next: String(page + 1),
    };
  }

  async get(type: string, id: string): Promise<SavedObjectRecord | undefined> {
    const response = await this.http.request('GET', objectPath(type, id));
    if (response.status === 404) {
      return undefined;
    }
    assertOk(response, `Get ${type}:${id}`);

    const checked = checkSavedObject(response.body);
    if (checked.isErr()) {
      throw new RequestError(
        `Unexpected saved object body for ${type}:${id}: ${checked.error}`,
        response.url,
        response.status,
        response.text,
      );
    }
    return checked.value;
  }

  async write(record: SavedObjectRecord): Promise<void> {
    const response = await this.http.request('POST', objectPath(record.type, record.id), {
      query: { overwrite: 'true' },
      body: { attributes: record.attributes, references: record.references },
    });
    assertOk(response, `Write ${record.type}:${record.id}`);
  }

  async delete(type: string, id: string): Promise<boolean> {
    const response = await this.http.request('DELETE', objectPath(type, id));
    if (response.status === 404) {
      return false;
    }
    assertOk(response, `Delete ${type}:${id}`);
    return true;
  }
}
