import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { FileOutcome, RunReport } from "./types.js";

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * One human-readable line per file, e.g. `lecture.mp3: partial (1 gap at index 2)`.
 */
export function formatOutcomeLine(outcome: FileOutcome): string {
  switch (outcome.status) {
    case "success":
      return outcome.chunks !== undefined
        ? `${outcome.file}: success (${plural(outcome.chunks, "chunk")})`
        : `${outcome.file}: success`;
    case "partial":
      return `${outcome.file}: partial (${plural(outcome.gaps.length, "gap")} at index ${outcome.gaps.join(", ")})`;
    case "failed":
      return `${outcome.file}: failed (${outcome.reason ?? "unknown error"})`;
  }
}

export function formatReport(report: RunReport): string {
  const counts = {
    success: report.files.filter((f) => f.status === "success").length,
    partial: report.files.filter((f) => f.status === "partial").length,
    failed: report.files.filter((f) => f.status === "failed").length,
  };

  return [
    `=== ${report.stage} report ===`,
    ...report.files.map(formatOutcomeLine),
    `--- ${report.files.length} file(s): ${counts.success} success, ${counts.partial} partial, ${counts.failed} failed${report.cancelled ? " (cancelled)" : ""}`,
  ].join("\n");
}

/**
 * Non-zero when any file failed outright; partial results still count as a run that worked.
 */
export function exitCodeFor(report: RunReport): number {
  return report.files.some((f) => f.status === "failed") ? 1 : 0;
}

export function reportFilename(stage: string, stamp: string): string {
  return `${stage}-report-${stamp}.yml`;
}

export function writeReport(report: RunReport, dir: string, stamp: string): string {
  fs.mkdirSync(dir, { recursive: true });
  const reportPath = path.join(dir, reportFilename(report.stage, stamp));
  fs.writeFileSync(reportPath, YAML.stringify(report), "utf-8");
  return reportPath;
}
