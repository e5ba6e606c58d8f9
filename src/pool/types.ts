import type { RetryPolicy } from "../config/types.js";
import type { TerminalTaskError } from "../errors.js";

export type { RetryPolicy };

export type PoolTask<P> = {
  /** Sequence index; identifies the task in the result. */
  index: number;
  payload: P;
};

export type AttemptContext = {
  index: number;
  /** 1-based. */
  attempt: number;
};

export type TaskCall<P, R> = (payload: P, context: AttemptContext) => Promise<R>;

/**
 * Per-task state. Transitions:
 *   pending → in_flight → succeeded
 *                       → retry_scheduled → in_flight
 *                       → failed
 */
export type TaskState<R> =
  | { status: "pending"; index: number }
  | { status: "in_flight"; index: number; attempt: number }
  | { status: "retry_scheduled"; index: number; attempt: number; delayMs: number; lastError: unknown }
  | { status: "succeeded"; index: number; attempts: number; value: R }
  | { status: "failed"; index: number; attempts: number; error: TerminalTaskError };

export type TaskOutcome<R> =
  | { status: "succeeded"; index: number; attempts: number; value: R }
  | { status: "failed"; index: number; attempts: number; error: TerminalTaskError };

export type PoolOptions<R> = {
  maxWorkers: number;
  retry: RetryPolicy;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  onTransition?: (state: TaskState<R>) => void;
};

export type PoolResult<R> = {
  outcomes: Map<number, TaskOutcome<R>>;
  /** Indices never completed because of cancellation, in submission order. */
  dropped: number[];
};
