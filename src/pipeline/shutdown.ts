import { log } from "../utils/logger.js";

const pipelineLog = log.withScope("pipeline");

export type ShutdownHandle = {
  signal: AbortSignal;
  dispose(): void;
};

/**
 * First SIGINT/SIGTERM stops new work: pools stop dispatching, running calls
 * finish and are reported. A second signal exits immediately.
 */
export function installShutdownHandler(): ShutdownHandle {
  const controller = new AbortController();

  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      pipelineLog.error(`Received ${signal} again, exiting without waiting`);
      process.exit(130);
    }
    pipelineLog.warn(`Received ${signal}, finishing in-flight requests (press Ctrl+C again to force exit)...`);
    controller.abort();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  return {
    signal: controller.signal,
    dispose() {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}
