import type { RetryPolicy } from "./types.js";

/**
 * Delay before retry number `retry` (1-based): base * 2^(retry-1), stretched by
 * up to jitterRatio, never above maxDelayMs.
 */
export function computeBackoffDelay(retry: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, retry - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  const jitter = policy.jitterRatio > 0 ? capped * policy.jitterRatio * random() : 0;
  return Math.round(Math.min(policy.maxDelayMs, capped + jitter));
}

export class SleepAborted extends Error {
  constructor() {
    super("Backoff interrupted by shutdown");
    this.name = "SleepAborted";
  }
}

/**
 * setTimeout-based wait that rejects with SleepAborted when the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SleepAborted());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new SleepAborted());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
