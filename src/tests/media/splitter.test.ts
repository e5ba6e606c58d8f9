import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { ConfigError, SplitError } from "../../errors.js";
import { assertMediaToolsAvailable, FfmpegMediaTool, type MediaTool, type SegmentRequest } from "../../media/ffmpeg.js";
import { removeChunkFiles, splitSource } from "../../media/splitter.js";
import type { SourceFile } from "../../pipeline/types.js";

const source: SourceFile = {
  sourceId: "lecture",
  path: "/recordings/lecture.mp3",
  fileName: "lecture.mp3",
  format: "mp3",
  sizeBytes: 1024,
};

function makeWorkDir(): string {
  return path.join(fs.mkdtempSync(path.join(os.tmpdir(), "chunkscribe-split-")), "work");
}

class FakeMediaTool implements MediaTool {
  readonly requests: SegmentRequest[] = [];

  constructor(
    private readonly durationMs: number,
    private readonly failAt: number | null = null,
  ) {}

  async probeDurationMs(): Promise<number> {
    return this.durationMs;
  }

  async extractSegment(request: SegmentRequest): Promise<void> {
    if (this.requests.length === this.failAt) {
      throw new Error("disk full");
    }
    this.requests.push(request);
    fs.writeFileSync(request.outputPath, `audio ${request.startMs}`);
  }
}

test("splitter writes one named chunk file per planned span", async () => {
  const workDir = makeWorkDir();
  const tool = new FakeMediaTool(65 * 60_000);

  const chunks = await splitSource(
    source,
    { chunkDurationMs: 1_200_000, overlapMs: 20_000, workDir, format: "mp3" },
    tool,
  );

  expect(chunks.map((chunk) => path.basename(chunk.path))).toEqual([
    "lecture_000.mp3",
    "lecture_001.mp3",
    "lecture_002.mp3",
    "lecture_003.mp3",
  ]);
  expect(tool.requests.map((r) => [r.startMs, r.durationMs])).toEqual([
    [0, 1_200_000],
    [1_180_000, 1_220_000],
    [2_380_000, 1_220_000],
    [3_580_000, 320_000],
  ]);
  expect(tool.requests.every((r) => r.inputPath === source.path && r.format === "mp3")).toBe(true);
  expect(chunks[2]).toMatchObject({ sourceId: "lecture", index: 2, overlapMs: 20_000, format: "mp3" });

  await removeChunkFiles(chunks);
  expect(fs.readdirSync(workDir)).toEqual([]);
});

test("extraction failure surfaces as SplitError naming the chunk", async () => {
  const tool = new FakeMediaTool(65 * 60_000, 1);

  const attempt = splitSource(
    source,
    { chunkDurationMs: 1_200_000, overlapMs: 20_000, workDir: makeWorkDir(), format: "mp3" },
    tool,
  );

  await expect(attempt).rejects.toBeInstanceOf(SplitError);
  await expect(attempt).rejects.toThrow("Failed to extract chunk 1 of lecture.mp3: disk full");
});

test("source with no audio is a SplitError", async () => {
  await expect(
    splitSource(
      source,
      { chunkDurationMs: 1_200_000, overlapMs: 20_000, workDir: makeWorkDir(), format: "mp3" },
      new FakeMediaTool(0),
    ),
  ).rejects.toThrow("No audio to split in lecture.mp3");
});

test("missing ffprobe binary is a SplitError for that source", async () => {
  const tool = new FfmpegMediaTool("/nonexistent/ffmpeg", "/nonexistent/ffprobe");
  await expect(tool.probeDurationMs("lecture.mp3")).rejects.toBeInstanceOf(SplitError);
});

test("startup check rejects a missing ffmpeg with ConfigError", async () => {
  await expect(assertMediaToolsAvailable("/nonexistent/ffmpeg", "/nonexistent/ffprobe")).rejects.toBeInstanceOf(
    ConfigError,
  );
});

test("chunks already written are removed when a later extraction fails", async () => {
  const workDir = makeWorkDir();
  const tool = new FakeMediaTool(65 * 60_000, 2);

  await expect(
    splitSource(source, { chunkDurationMs: 1_200_000, overlapMs: 20_000, workDir, format: "mp3" }, tool),
  ).rejects.toThrow("Failed to extract chunk 2 of lecture.mp3: disk full");

  expect(tool.requests).toHaveLength(2);
  expect(fs.readdirSync(workDir)).toEqual([]);
});

test("a half-written chunk is removed along with the others", async () => {
  const workDir = makeWorkDir();
  const tool: MediaTool = {
    probeDurationMs: async () => 65 * 60_000,
    extractSegment: async (request) => {
      fs.writeFileSync(request.outputPath, "partial audio");
      if (request.outputPath.endsWith("_001.mp3")) throw new Error("killed");
    },
  };

  await expect(
    splitSource(source, { chunkDurationMs: 1_200_000, overlapMs: 20_000, workDir, format: "mp3" }, tool),
  ).rejects.toBeInstanceOf(SplitError);

  expect(fs.readdirSync(workDir)).toEqual([]);
});
