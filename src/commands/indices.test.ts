import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { FakeCluster } from '../../tests/utils/fake-cluster';
import { FakeDashboards } from '../../tests/utils/fake-dashboards';
import { MemoryStream, makeConfig } from '../../tests/utils/test-helpers';
import type { CommandContext, ExitFn } from './context';
import { main } from './indices';

describe('commands/indices', () => {
  let cluster: FakeCluster;
  let stdout: MemoryStream;
  let stderr: MemoryStream;
  let exit: Mock<ExitFn>;

  function context(args: string[]): CommandContext {
    return {
      config: makeConfig(),
      args,
      deps: { fetchFactory: () => new FakeDashboards().fetch, clusterFactory: () => cluster },
      stdout,
      stderr,
    };
  }

  beforeEach(() => {
    cluster = new FakeCluster();
    cluster.indices.set('logs-000001', new Map());
    stdout = new MemoryStream();
    stderr = new MemoryStream();
    exit = vi.fn<ExitFn>();
  });

  it('should delete an existing index', async () => {
    await main(exit, context(['delete', 'logs-000001']));

    expect(stdout.text).toBe("Index 'logs-000001' deleted\n");
    expect(cluster.indices.has('logs-000001')).toBe(false);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should report a missing index', async () => {
    await main(exit, context(['delete', 'nope']));

    expect(JSON.parse(stderr.text)).toEqual({
      error: {
        kind: 'IndexNotFoundError',
        code: 'INDEX_NOT_FOUND',
        message: "Index 'nope' not found",
      },
    });
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should print usage without an index name', async () => {
    await main(exit, context(['delete']));

    expect(stderr.text).toBe('Usage: dashsync index delete <index-name>\n');
    expect(exit).toHaveBeenCalledWith(2);
  });
});
