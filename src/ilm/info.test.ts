import { describe, it, expect, beforeEach } from 'vitest';
import { FakeCluster } from '../../tests/utils/fake-cluster';
import { getLifecycleInfo } from './info';

describe('ilm/info', () => {
  const start = Date.UTC(2025, 0, 1);
  let cluster: FakeCluster;

  beforeEach(() => {
    cluster = new FakeCluster();
    cluster.explain = [
      {
        index: 'logs-000001',
        managed: true,
        policy: 'logs',
        phase: 'hot',
        age: '2d',
        lifecycleDateMillis: start,
      },
      { index: 'scratch', managed: false },
      { index: 'logs-000002', managed: true, policy: 'logs', phase: 'warm', age: '10d' },
    ];
    cluster.policies.set('logs', {
      phases: {
        hot: { min_age: '0ms', actions: {} },
        warm: { min_age: '7d', actions: {} },
        delete: { min_age: '30d', actions: {} },
      },
    });
    cluster.sizes = { 'logs-000001': 100, 'logs-000002': 500, scratch: 50 };
  });

  it('should list managed indices, largest first', async () => {
    const rows = await getLifecycleInfo(cluster);

    expect(rows).toEqual([
      { index: 'logs-000002', policy: 'logs', phase: 'warm', age: '10d', sizeBytes: 500 },
      {
        index: 'logs-000001',
        policy: 'logs',
        phase: 'hot',
        age: '2d',
        sizeBytes: 100,
        warmAt: new Date(Date.UTC(2025, 0, 8)),
        coldAt: undefined,
        deleteAt: new Date(Date.UTC(2025, 0, 31)),
      },
    ]);
  });

  it('should include unmanaged indices when asked', async () => {
    const rows = await getLifecycleInfo(cluster, { all: true });

    expect(rows.map((row) => row.index)).toEqual(['logs-000002', 'logs-000001', 'scratch']);
    expect(rows[2]).toEqual({
      index: 'scratch',
      policy: 'unmanaged',
      phase: '-',
      age: '-',
      sizeBytes: 50,
    });
  });

  it('should count a missing size as zero', async () => {
    cluster.sizes = {};
    const rows = await getLifecycleInfo(cluster);
    expect(rows.map((row) => row.sizeBytes)).toEqual([0, 0]);
  });

  it('should read index state management on OpenSearch', async () => {
    cluster.distributionName = 'opensearch';
    cluster.stateExplain = [
      { index: 'metrics-1', managed: true, policy: 'rollover', phase: 'ingest' },
      { index: 'notes', managed: false },
    ];
    cluster.sizes = { 'metrics-1': 700, notes: 20 };

    const rows = await getLifecycleInfo(cluster);

    expect(rows).toEqual([
      { index: 'metrics-1', policy: 'rollover', phase: 'ingest', age: '-', sizeBytes: 700 },
    ]);
  });
});
