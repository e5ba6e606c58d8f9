import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import YAML from "yaml";
import { loadConfig } from "../../config/env.js";
import { openRun } from "../../pipeline/runContext.js";
import type { RunReport } from "../../pipeline/types.js";

test("a run leaves a log and a YAML report, and returns the exit code", () => {
  const logDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "chunkscribe-run-")), "logs");
  const cfg = loadConfig({ LOG_DIR: logDir });
  const run = openRun(cfg, "summarize", new Date(2026, 0, 2, 3, 4, 5));

  expect(run.stamp).toBe("20260102-030405");
  expect(run.logPath).toBe(path.join(logDir, "summarize-20260102-030405.log"));

  const report: RunReport = {
    stage: "summarize",
    startedAt: "2026-01-02T03:04:05.000Z",
    finishedAt: "2026-01-02T03:05:00.000Z",
    cancelled: false,
    files: [{ file: "talk.txt", status: "failed", gaps: [], reason: "auth_error: bad key" }],
  };

  expect(run.finish(report)).toBe(1);
  const written = fs.readFileSync(path.join(logDir, "summarize-report-20260102-030405.yml"), "utf-8");
  expect(YAML.parse(written)).toEqual(report);
  expect(fs.readFileSync(run.logPath, "utf-8")).toContain('"message":"summarize run 20260102-030405 started"');
});
