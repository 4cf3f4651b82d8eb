import { describe, it, expect } from 'vitest';
import { FakeCluster } from '../../tests/utils/fake-cluster';
import { FakeDashboards } from '../../tests/utils/fake-dashboards';
import { makeProfile, makeRecord } from '../../tests/utils/test-helpers';
import { createServerTarget } from '../targets';
import type { FetchFn } from '../transport/http';
import { DashboardsHttp } from '../transport/http';
import { DuplicateRecordError, NotFoundError, PartialExportError } from '../types/errors';
import type { SavedObjectRecord } from '../types/saved-objects';
import type { SavedObjectBackend } from './backend';
import { LegacyIndexBackend } from './legacy-backend';
import { ModernApiBackend } from './modern-backend';
import type { RepositoryOptions } from './repository';
import { ObjectRepositoryClient } from './repository';

const target = createServerTarget(makeProfile('local'), true);

interface Harness {
  backend: SavedObjectBackend;
  fake?: FakeDashboards;
  cluster?: FakeCluster;
}

const harnesses: [string, () => Harness][] = [
  [
    'ModernApi',
    () => {
      const fake = new FakeDashboards();
      return { backend: new ModernApiBackend(new DashboardsHttp(target, fake.fetch, 1000)), fake };
    },
  ],
  [
    'LegacyIndex',
    () => {
      const cluster = new FakeCluster();
      return { backend: new LegacyIndexBackend(cluster, '.kibana'), cluster };
    },
  ],
];

async function seed(backend: SavedObjectBackend, records: SavedObjectRecord[]): Promise<void> {
  for (const record of records) {
    await backend.write(record);
  }
}

async function collect(iterable: AsyncIterable<SavedObjectRecord>): Promise<SavedObjectRecord[]> {
  const records: SavedObjectRecord[] = [];
  for await (const record of iterable) {
    records.push(record);
  }
  return records;
}

function repository(backend: SavedObjectBackend, options: RepositoryOptions = {}): ObjectRepositoryClient {
  return new ObjectRepositoryClient(backend, { retryBaseDelayMs: 0, ...options });
}

describe.each(harnesses)('ObjectRepositoryClient over %s', (mode, createHarness) => {
  it('should report the backend mode', () => {
    expect(repository(createHarness().backend).mode).toBe(mode);
  });

  it('should list every page exactly once', async () => {
    const { backend } = createHarness();
    const dashboards = Array.from({ length: 6 }, (_, i) => makeRecord('dashboard', `d${String(i)}`));
    await seed(backend, [...dashboards, makeRecord('search', 's1')]);

    const listed = await collect(repository(backend, { pageSize: 2 }).list(['dashboard']));

    expect(listed).toEqual(dashboards);
  });

  it('should list all managed types by default', async () => {
    const { backend } = createHarness();
    await seed(backend, [
      makeRecord('dashboard', 'd1'),
      makeRecord('index-pattern', 'logs'),
      makeRecord('config', '8.15.0'),
    ]);

    const listed = await collect(repository(backend).list());

    expect(listed.map((record) => `${record.type}:${record.id}`)).toEqual([
      'dashboard:d1',
      'index-pattern:logs',
    ]);
  });

  it('should get, find and check existence', async () => {
    const { backend } = createHarness();
    const record = makeRecord('visualization', 'v1', 'Requests', [
      { type: 'index-pattern', id: 'logs', name: 'kibanaSavedObjectMeta.searchSourceJSON.index' },
    ]);
    await seed(backend, [record]);
    const repo = repository(backend);

    expect(await repo.get('visualization', 'v1')).toEqual(record);
    expect(await repo.find('visualization', 'missing')).toBeUndefined();
    expect(await repo.exists('visualization', 'v1')).toBe(true);
    expect(await repo.exists('dashboard', 'v1')).toBe(false);
    await expect(repo.get('dashboard', 'nope')).rejects.toThrow(NotFoundError);
  });

  it('should delete idempotently', async () => {
    const { backend } = createHarness();
    await seed(backend, [makeRecord('search', 's1')]);
    const repo = repository(backend);

    expect(await repo.delete('search', 's1')).toBe(true);
    expect(await repo.delete('search', 's1')).toBe(false);
    expect(await repo.exists('search', 's1')).toBe(false);
  });

  it('should create, skip and overwrite on import', async () => {
    const { backend } = createHarness();
    const repo = repository(backend);
    const original = makeRecord('dashboard', 'web', 'Web');
    const changed = makeRecord('dashboard', 'web', 'Web v2');

    expect(await repo.importBatch([original], false)).toEqual([
      { id: 'web', type: 'dashboard', status: 'created' },
    ]);
    expect(await repo.importBatch([changed], false)).toEqual([
      { id: 'web', type: 'dashboard', status: 'skipped' },
    ]);
    expect((await repo.get('dashboard', 'web')).attributes).toEqual({ title: 'Web' });

    expect(await repo.importBatch([changed], true)).toEqual([
      { id: 'web', type: 'dashboard', status: 'overwritten' },
    ]);
    expect((await repo.get('dashboard', 'web')).attributes).toEqual({ title: 'Web v2' });
  });

  it('should fail invalid records without stopping the batch', async () => {
    const { backend } = createHarness();
    const invalid: SavedObjectRecord = {
      id: 'bad',
      type: 'dashboard',
      attributes: {},
      references: [{ type: '', id: '', name: '' }],
    };

    const outcomes = await repository(backend).importBatch(
      [invalid, makeRecord('search', 's1')],
      false,
    );

    expect(outcomes).toEqual([
      {
        id: 'bad',
        type: 'dashboard',
        status: 'failed',
        error: {
          kind: 'InvalidRecordError',
          message: 'Invalid saved object: references[0] needs a non-empty type and id',
        },
      },
      { id: 's1', type: 'search', status: 'created' },
    ]);
  });

  it('should export ids in request order', async () => {
    const { backend } = createHarness();
    await seed(backend, [makeRecord('dashboard', 'a'), makeRecord('dashboard', 'b')]);

    const result = await repository(backend).export({ types: ['dashboard'], ids: ['b', 'a', 'b'] });

    expect(result.batch.map((record) => record.id)).toEqual(['b', 'a']);
    expect(result.missingIds).toEqual([]);
  });

  it('should fail an export with missing ids unless best effort', async () => {
    const { backend } = createHarness();
    await seed(backend, [makeRecord('dashboard', 'a')]);
    const repo = repository(backend);

    const error: unknown = await repo
      .export({ types: ['dashboard'], ids: ['a', 'zzz'] })
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PartialExportError);
    expect(error).toMatchObject({
      missingIds: ['zzz'],
      message: 'Export incomplete, objects not found: zzz',
    });

    const result = await repo.export({ types: ['dashboard'], ids: ['a', 'zzz'], bestEffort: true });
    expect(result.batch.map((record) => record.id)).toEqual(['a']);
    expect(result.missingIds).toEqual(['zzz']);
  });

  it('should export everything without ids', async () => {
    const { backend } = createHarness();
    const records = [makeRecord('dashboard', 'a'), makeRecord('lens', 'l1')];
    await seed(backend, records);

    const result = await repository(backend).export();

    expect(result.batch).toEqual(records);
  });

  it('should mark every record as aborted once the session is aborted', async () => {
    const { backend } = createHarness();
    const controller = new AbortController();
    controller.abort();

    const outcomes = await repository(backend, { signal: controller.signal }).importBatch(
      [makeRecord('search', 's1')],
      false,
    );

    expect(outcomes).toEqual([
      {
        id: 's1',
        type: 'search',
        status: 'failed',
        error: { kind: 'AbortError', message: 'Import aborted before this record was written' },
      },
    ]);
  });

  it('should fail later copies of an object repeated in the batch', async () => {
    const { backend } = createHarness();
    const repo = repository(backend);

    const outcomes = await repo.importBatch(
      [makeRecord('dashboard', 'x', 'First'), makeRecord('dashboard', 'x', 'Second')],
      false,
    );

    expect(outcomes).toEqual([
      { id: 'x', type: 'dashboard', status: 'created' },
      {
        id: 'x',
        type: 'dashboard',
        status: 'failed',
        error: {
          kind: 'DuplicateRecordError',
          message: 'Saved object dashboard:x appears more than once in the import batch',
        },
      },
    ]);
    expect((await repo.get('dashboard', 'x')).attributes).toEqual({ title: 'First' });
  });

  it('should fail records referencing an object that failed earlier in the import', async () => {
    const { backend } = createHarness();
    const repo = repository(backend);
    const search = makeRecord('search', 's1', 'Errors', [
      { type: 'index-pattern', id: 'logs', name: 'kibanaSavedObjectMeta.searchSourceJSON.index' },
    ]);

    const outcomes = await repo.importBatch([search], false, {
      failed: [{ type: 'index-pattern', id: 'logs' }],
    });

    expect(outcomes).toEqual([
      {
        id: 's1',
        type: 'search',
        status: 'failed',
        error: {
          kind: 'DanglingReferenceError',
          message: 'Saved object search:s1 references missing objects: index-pattern:logs',
        },
      },
    ]);
    expect(await repo.exists('search', 's1')).toBe(false);
  });

  it('should write a record whose failed reference already exists in the destination', async () => {
    const { backend } = createHarness();
    await seed(backend, [makeRecord('index-pattern', 'logs')]);
    const search = makeRecord('search', 's1', 'Errors', [
      { type: 'index-pattern', id: 'logs', name: 'kibanaSavedObjectMeta.searchSourceJSON.index' },
    ]);

    const outcomes = await repository(backend).importBatch([search], false, {
      failed: [{ type: 'index-pattern', id: 'logs' }],
    });

    expect(outcomes).toEqual([{ id: 's1', type: 'search', status: 'created' }]);
  });
});

describe('ObjectRepositoryClient', () => {
  it('should reject a listing that returns the same object twice', async () => {
    const backend: SavedObjectBackend = {
      mode: 'ModernApi',
      findPage: async () =>
        Promise.resolve({
          records: [makeRecord('dashboard', 'a')],
          scanned: 1,
          total: 3,
          next: 'more',
        }),
      get: async () => Promise.resolve(undefined),
      write: async () => Promise.resolve(),
      delete: async () => Promise.resolve(false),
    };

    await expect(collect(repository(backend).list())).rejects.toThrow(DuplicateRecordError);
  });

  it('should stop on an empty page even below the reported total', async () => {
    let calls = 0;
    const backend: SavedObjectBackend = {
      mode: 'ModernApi',
      findPage: async (_types, cursor) => {
        calls++;
        return Promise.resolve(
          cursor === undefined
            ? { records: [makeRecord('dashboard', 'a')], scanned: 1, total: 10, next: '2' }
            : { records: [], scanned: 0, total: 10 },
        );
      },
      get: async () => Promise.resolve(undefined),
      write: async () => Promise.resolve(),
      delete: async () => Promise.resolve(false),
    };

    expect(await collect(repository(backend).list())).toHaveLength(1);
    expect(calls).toBe(2);
  });

  it('should retry transient list failures', async () => {
    const fake = new FakeDashboards().seed(makeRecord('dashboard', 'a'));
    fake.transientFindFailures = 2;
    const backend = new ModernApiBackend(new DashboardsHttp(target, fake.fetch, 1000));

    const listed = await collect(repository(backend, { retries: 2 }).list(['dashboard']));

    expect(listed.map((record) => record.id)).toEqual(['a']);
    expect(fake.requestsTo('GET', '/api/saved_objects/_find')).toHaveLength(3);
  });

  it('should not retry failed writes', async () => {
    const fake = new FakeDashboards();
    fake.failingWrites.add('dashboard:b');
    const backend = new ModernApiBackend(new DashboardsHttp(target, fake.fetch, 1000));

    const outcomes = await repository(backend).importBatch(
      [makeRecord('dashboard', 'a'), makeRecord('dashboard', 'b')],
      false,
    );

    expect(outcomes).toEqual([
      { id: 'a', type: 'dashboard', status: 'created' },
      {
        id: 'b',
        type: 'dashboard',
        status: 'failed',
        error: { kind: 'ConnectionError', message: 'Write dashboard:b failed with HTTP 500' },
      },
    ]);
    expect(fake.requestsTo('POST', '/api/saved_objects/dashboard/b')).toHaveLength(1);
  });

  it('should store legacy documents under type-prefixed ids', async () => {
    const cluster = new FakeCluster();
    const repo = repository(new LegacyIndexBackend(cluster, '.kibana'));

    await repo.importBatch([makeRecord('dashboard', 'web', 'Web')], false);

    expect(cluster.indices.get('.kibana')?.get('dashboard:web')).toEqual({
      type: 'dashboard',
      dashboard: { title: 'Web' },
      references: [],
    });
  });

  it('should fail a record whose batch reference failed to write', async () => {
    const fake = new FakeDashboards();
    fake.failingWrites.add('index-pattern:logs');
    const backend = new ModernApiBackend(new DashboardsHttp(target, fake.fetch, 1000));
    const search = makeRecord('search', 's1', 'Errors', [
      { type: 'index-pattern', id: 'logs', name: 'kibanaSavedObjectMeta.searchSourceJSON.index' },
    ]);

    const outcomes = await repository(backend).importBatch(
      [makeRecord('index-pattern', 'logs'), search],
      false,
    );

    expect(outcomes).toEqual([
      {
        id: 'logs',
        type: 'index-pattern',
        status: 'failed',
        error: { kind: 'ConnectionError', message: 'Write index-pattern:logs failed with HTTP 500' },
      },
      {
        id: 's1',
        type: 'search',
        status: 'failed',
        error: {
          kind: 'DanglingReferenceError',
          message: 'Saved object search:s1 references missing objects: index-pattern:logs',
        },
      },
    ]);
    expect(fake.requestsTo('POST', '/api/saved_objects/search/s1')).toHaveLength(0);
  });

  it('should not wait on a later record of the batch', async () => {
    const fake = new FakeDashboards();
    const backend = new ModernApiBackend(new DashboardsHttp(target, fake.fetch, 1000));
    const dashboard = makeRecord('dashboard', 'd1', 'Overview', [
      { type: 'search', id: 's1', name: 'panel_0' },
    ]);
    const search = makeRecord('search', 's1', 'Errors', [
      { type: 'dashboard', id: 'd1', name: 'drilldown' },
    ]);

    const outcomes = await repository(backend, { concurrency: 2 }).importBatch(
      [dashboard, search],
      false,
    );

    expect(outcomes.map((outcome) => outcome.status)).toEqual(['created', 'created']);
  });

  it('should return the fetched part of an export interrupted by an abort', async () => {
    const fake = new FakeDashboards().seed(
      makeRecord('dashboard', 'd1'),
      makeRecord('dashboard', 'd2'),
      makeRecord('dashboard', 'd3'),
    );
    const controller = new AbortController();
    const fetchFn: FetchFn = async (input, init) => {
      controller.abort();
      return fake.fetch(input, init);
    };
    const backend = new ModernApiBackend(new DashboardsHttp(target, fetchFn, 1000));
    const repo = repository(backend, { concurrency: 1, signal: controller.signal });

    const result = await repo.export({ types: ['dashboard'], ids: ['d1', 'd2', 'd3'] });

    expect(result).toEqual({
      batch: [makeRecord('dashboard', 'd1')],
      missingIds: [],
      aborted: true,
      unfetchedIds: ['d2', 'd3'],
    });
  });

  it('should page a legacy listing past the result window with one scroll', async () => {
    const cluster = new FakeCluster();
    const backend = new LegacyIndexBackend(cluster, '.kibana');
    const dashboards = Array.from({ length: 25 }, (_, i) => makeRecord('dashboard', `d${String(i)}`));
    await seed(backend, dashboards);

    const listed = await collect(repository(backend, { pageSize: 10 }).list(['dashboard']));

    expect(listed).toEqual(dashboards);
    expect(cluster.scrollRequests).toEqual([{ size: 10, keepAlive: '2m', types: ['dashboard'] }]);
    expect(cluster.scrolls.size).toBe(0);
  });

  it('should release the legacy scroll when the caller stops early', async () => {
    const cluster = new FakeCluster();
    const backend = new LegacyIndexBackend(cluster, '.kibana');
    await seed(backend, [makeRecord('dashboard', 'a'), makeRecord('dashboard', 'b')]);

    for await (const record of repository(backend, { pageSize: 1 }).list(['dashboard'])) {
      expect(record.id).toBe('a');
      break;
    }

    expect(cluster.scrollRequests).toHaveLength(1);
    expect(cluster.scrolls.size).toBe(0);
  });
});
