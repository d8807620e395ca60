export type PoolTask<K, T> = {
  key: K;
  run: () => Promise<T>;
};

export type TaskOutcome<K, T> =
  | { key: K; status: 'fulfilled'; value: T }
  | { key: K; status: 'rejected'; reason: unknown }
  | { key: K; status: 'timeout'; timeoutMs: number };

export type PoolOptions<K, T> = {
  concurrency: number;
  timeoutMs: number;
  onSettled?: (outcome: TaskOutcome<K, T>) => void;
};

const TIMED_OUT = Symbol('timed-out');

// Stops waiting after timeoutMs. The underlying work is not cancelled.
async function raceTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T | typeof TIMED_OUT> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs tasks on at most `concurrency` workers, each with its own timeout.
 * Outcomes are returned in completion order; one task failing or timing out
 * never affects the others.
 */
export async function runPool<K, T>(tasks: readonly PoolTask<K, T>[], opts: PoolOptions<K, T>): Promise<TaskOutcome<K, T>[]> {
  const outcomes: TaskOutcome<K, T>[] = [];
  const workers = Math.max(1, Math.min(opts.concurrency, tasks.length));
  let next = 0;

  const settle = (outcome: TaskOutcome<K, T>) => {
    outcomes.push(outcome);
    opts.onSettled?.(outcome);
  };

  const worker = async () => {
    while (next < tasks.length) {
      const task = tasks[next++];
      try {
        // run() may throw synchronously; keep that inside the try.
        const value = await raceTimeout(Promise.resolve().then(task.run), opts.timeoutMs);
        if (value === TIMED_OUT) settle({ key: task.key, status: 'timeout', timeoutMs: opts.timeoutMs });
        else settle({ key: task.key, status: 'fulfilled', value });
      } catch (reason) {
        settle({ key: task.key, status: 'rejected', reason });
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, worker));
  return outcomes;
}
