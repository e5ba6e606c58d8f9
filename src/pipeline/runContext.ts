import path from "node:path";
import type { Config } from "../config/types.js";
import { log } from "../utils/logger.js";
import { runStamp } from "../utils/timestamps.js";
import { exitCodeFor, formatReport, writeReport } from "./report.js";
import type { RunReport, StageName } from "./types.js";

const pipelineLog = log.withScope("pipeline");

export type RunContext = {
  stamp: string;
  logPath: string;
  /** Print and persist the report; returns the process exit code. */
  finish(report: RunReport): number;
};

/**
 * Per-invocation artifacts: a JSON-lines log under LOG_DIR and, on finish,
 * a YAML report next to it.
 */
export function openRun(cfg: Config, stage: StageName, now: Date = new Date()): RunContext {
  const stamp = runStamp(now);
  const logPath = path.join(cfg.paths.logDir, `${stage}-${stamp}.log`);
  log.attachFile(logPath);
  pipelineLog.info(`${stage} run ${stamp} started`, { log: logPath });

  return {
    stamp,
    logPath,
    finish(report) {
      const reportPath = writeReport(report, cfg.paths.logDir, stamp);
      console.log(`\n${formatReport(report)}`);
      pipelineLog.info(`Report written: ${reportPath}`);
      log.attachFile(null);
      return exitCodeFor(report);
    },
  };
}
