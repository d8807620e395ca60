import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { runPool, type PoolTask } from '../src/review/pool.js';

const after = <T>(ms: number, value: T) => new Promise<T>((resolve) => setTimeout(() => resolve(value), ms));

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('runPool', () => {
  it('reports outcomes in completion order', async () => {
    const tasks: PoolTask<string, string>[] = [
      { key: 'a', run: () => after(30, 'A') },
      { key: 'b', run: () => after(10, 'B') },
      { key: 'c', run: () => Promise.reject(new Error('boom')) },
      { key: 'd', run: () => after(1000, 'D') },
    ];

    const pending = runPool(tasks, { concurrency: 4, timeoutMs: 100 });
    await vi.advanceTimersByTimeAsync(1000);
    const outcomes = await pending;

    expect(outcomes.map((o) => `${o.key}:${o.status}`)).toEqual(['c:rejected', 'b:fulfilled', 'a:fulfilled', 'd:timeout']);
    expect(outcomes[1]).toEqual({ key: 'b', status: 'fulfilled', value: 'B' });
    expect(outcomes[3]).toEqual({ key: 'd', status: 'timeout', timeoutMs: 100 });
  });

  it('runs one task at a time with concurrency 1', async () => {
    let active = 0;
    let peak = 0;
    const task = (key: string, ms: number): PoolTask<string, string> => ({
      key,
      run: async () => {
        active++;
        peak = Math.max(peak, active);
        await after(ms, key);
        active--;
        return key;
      },
    });

    const pending = runPool([task('a', 30), task('b', 10)], { concurrency: 1, timeoutMs: 100 });
    await vi.advanceTimersByTimeAsync(100);
    const outcomes = await pending;

    expect(outcomes.map((o) => o.key)).toEqual(['a', 'b']);
    expect(peak).toBe(1);
  });

  it('captures synchronous throws and notifies each settlement', async () => {
    const seen: string[] = [];
    const tasks: PoolTask<string, string>[] = [
      {
        key: 'sync',
        run: () => {
          throw new Error('sync');
        },
      },
      { key: 'ok', run: () => after(5, 'ok') },
    ];

    const pending = runPool(tasks, { concurrency: 2, timeoutMs: 50, onSettled: (o) => seen.push(o.key) });
    await vi.advanceTimersByTimeAsync(10);
    const outcomes = await pending;

    expect(outcomes[0]).toMatchObject({ key: 'sync', status: 'rejected' });
    expect(seen).toEqual(['sync', 'ok']);
  });

  it('returns nothing for no tasks', async () => {
    await expect(runPool([], { concurrency: 3, timeoutMs: 10 })).resolves.toEqual([]);
  });
});
