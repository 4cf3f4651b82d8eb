import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from './pool';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('objects/pool', () => {
  it('should keep input order regardless of completion order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (delay) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return delay * 2;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 20 },
      { status: 'fulfilled', value: 40 },
    ]);
  });

  it('should never run more than the limit at once', async () => {
    let inflight = 0;
    let peak = 0;
    await mapWithConcurrency(Array.from({ length: 12 }, (_, i) => i), 3, async () => {
      inflight++;
      peak = Math.max(peak, inflight);
      await new Promise((resolve) => setTimeout(resolve, 2));
      inflight--;
    });

    expect(peak).toBe(3);
  });

  it('should settle failures per item', async () => {
    const failure = new Error('boom');
    const results = await mapWithConcurrency(['a', 'b'], 2, async (item) => {
      if (item === 'b') {
        throw failure;
      }
      return Promise.resolve(item);
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 'a' },
      { status: 'rejected', reason: failure },
    ]);
  });

  it('should start no new work after abort', async () => {
    const controller = new AbortController();
    const gate = deferred();
    const started: number[] = [];

    const pending = mapWithConcurrency(
      [0, 1, 2, 3],
      1,
      async (item) => {
        started.push(item);
        if (item === 0) {
          await gate.promise;
        }
        return item;
      },
      controller.signal,
    );

    controller.abort();
    gate.resolve();
    const results = await pending;

    expect(started).toEqual([0]);
    expect(results).toEqual([
      { status: 'fulfilled', value: 0 },
      { status: 'skipped' },
      { status: 'skipped' },
      { status: 'skipped' },
    ]);
  });

  it('should handle an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => Promise.resolve(1))).toEqual([]);
  });
});
