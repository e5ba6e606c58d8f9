import { describeError } from "../errors.js";
import type { ScopedLogger } from "../utils/logger.js";
import type { TaskState } from "./types.js";

/**
 * onTransition hook that narrates a pool run through a scoped logger.
 * `label` turns a task index into something readable ("lecture.mp3#002").
 */
export function logTransitions<R>(
  logger: ScopedLogger,
  label: (index: number) => string,
): (state: TaskState<R>) => void {
  return (state) => {
    switch (state.status) {
      case "pending":
        logger.trace(`${label(state.index)} queued`);
        break;
      case "in_flight":
        logger.debug(`${label(state.index)} attempt ${state.attempt}`);
        break;
      case "retry_scheduled":
        logger.warn(
          `${label(state.index)} attempt ${state.attempt} failed (${describeError(state.lastError)}), retrying in ${state.delayMs}ms`,
        );
        break;
      case "succeeded":
        logger.debug(`${label(state.index)} done after ${state.attempts} attempt(s)`);
        break;
      case "failed":
        logger.error(`${label(state.index)} gave up: ${describeError(state.error.lastError)}`, {
          attempts: state.attempts,
        });
        break;
    }
  };
}
