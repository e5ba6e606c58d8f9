import { RemoteError, TerminalTaskError } from "../errors.js";
import { computeBackoffDelay, sleep as defaultSleep, SleepAborted } from "./backoff.js";
import { ResultCollector } from "./resultCollector.js";
import type { PoolOptions, PoolResult, PoolTask, TaskCall, TaskOutcome, TaskState } from "./types.js";

export function isRetryable(err: unknown): boolean {
  return err instanceof RemoteError && err.retryable;
}

function validate<P>(tasks: PoolTask<P>[], options: Pick<PoolOptions<never>, "maxWorkers" | "retry">): void {
  if (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1) {
    throw new RangeError(`maxWorkers must be an integer >= 1, got ${options.maxWorkers}`);
  }
  if (!Number.isInteger(options.retry.maxRetries) || options.retry.maxRetries < 0) {
    throw new RangeError(`maxRetries must be an integer >= 0, got ${options.retry.maxRetries}`);
  }
  const seen = new Set<number>();
  for (const task of tasks) {
    if (seen.has(task.index)) {
      throw new RangeError(`Duplicate task index ${task.index}`);
    }
    seen.add(task.index);
  }
}

/**
 * Run independent tasks with at most `maxWorkers` calls in flight.
 *
 * Tasks start in submission order and may finish in any order. A task that
 * keeps failing with a retryable RemoteError is attempted maxRetries + 1 times;
 * any other error fails it after one attempt. Failures never reject the pool:
 * they come back as `failed` outcomes carrying a TerminalTaskError.
 *
 * After `signal` aborts, no further task starts, running attempts finish and
 * are recorded, and tasks still queued or waiting out a backoff are returned
 * in `dropped`.
 */
export async function runPool<P, R>(
  tasks: PoolTask<P>[],
  call: TaskCall<P, R>,
  options: PoolOptions<R>,
): Promise<PoolResult<R>> {
  validate(tasks, options);

  const wait = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const { retry, signal } = options;
  const collector = new ResultCollector<TaskOutcome<R>>();
  const dropped = new Set<number>();
  const cancelled = () => signal?.aborted === true;

  const transition = (state: TaskState<R>) => {
    options.onTransition?.(state);
  };

  for (const task of tasks) {
    transition({ status: "pending", index: task.index });
  }

  async function runTask(task: PoolTask<P>): Promise<void> {
    const { index } = task;
    let attempt = 0;

    for (;;) {
      attempt += 1;
      transition({ status: "in_flight", index, attempt });

      let lastError: unknown;
      try {
        const value = await call(task.payload, { index, attempt });
        const outcome: TaskOutcome<R> = { status: "succeeded", index, attempts: attempt, value };
        collector.record(index, outcome);
        transition(outcome);
        return;
      } catch (err) {
        lastError = err;
      }

      if (!isRetryable(lastError) || attempt > retry.maxRetries) {
        const outcome: TaskOutcome<R> = {
          status: "failed",
          index,
          attempts: attempt,
          error: new TerminalTaskError(index, attempt, lastError),
        };
        collector.record(index, outcome);
        transition(outcome);
        return;
      }

      const delayMs = computeBackoffDelay(attempt, retry, random);
      transition({ status: "retry_scheduled", index, attempt, delayMs, lastError });

      try {
        await wait(delayMs, signal);
      } catch (err) {
        if (!(err instanceof SleepAborted)) throw err;
      }
      if (cancelled()) {
        dropped.add(index);
        return;
      }
    }
  }

  let next = 0;

  async function worker(): Promise<void> {
    while (next < tasks.length && !cancelled()) {
      const task = tasks[next];
      next += 1;
      if (task) await runTask(task);
    }
  }

  const workerCount = Math.min(options.maxWorkers, tasks.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  for (const task of tasks.slice(next)) {
    dropped.add(task.index);
  }

  return {
    outcomes: collector.toSortedMap(),
    dropped: tasks.map((task) => task.index).filter((index) => dropped.has(index)),
  };
}
