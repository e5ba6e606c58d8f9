import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, expect, test } from "vitest";
import { log } from "../../utils/logger.js";

afterEach(() => {
  log.attachFile(null);
  log.configure({ level: "error", format: "pretty" });
});

test("attached file receives debug and above as JSON lines, whatever the console level", () => {
  const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "chunkscribe-log-")), "runs", "transcribe.log");
  log.configure({ level: "error", format: "pretty" });
  log.attachFile(file);

  const poolLog = log.withScope("pool");
  poolLog.trace("queued");
  poolLog.debug("attempt 1");
  poolLog.warn("retrying", { delayMs: 1000 });

  const entries: unknown[] = fs
    .readFileSync(file, "utf-8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));

  expect(entries).toHaveLength(2);
  expect(entries[0]).toMatchObject({ level: "debug", scope: "pool", message: "attempt 1" });
  expect(entries[1]).toMatchObject({ level: "warn", scope: "pool", message: "retrying", data: { delayMs: 1000 } });
});

test("detached logger stops writing the file", () => {
  const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "chunkscribe-log-")), "run.log");
  log.attachFile(file);
  log.withScope("boot").info("first");
  log.attachFile(null);
  log.withScope("boot").info("second");

  expect(fs.readFileSync(file, "utf-8").trim().split("\n")).toHaveLength(1);
});
