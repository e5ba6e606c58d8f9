import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { discoverSources, discoverTranscripts, sourceFromPath } from "../../pipeline/discover.js";

test("audio discovery is sorted, case-insensitive and ignores other files", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chunkscribe-input-"));
  fs.writeFileSync(path.join(dir, "b-talk.MP3"), "x");
  fs.writeFileSync(path.join(dir, "a-lecture.m4a"), "xy");
  fs.writeFileSync(path.join(dir, "notes.txt"), "not audio");
  fs.mkdirSync(path.join(dir, "c-folder.wav"));

  const sources = await discoverSources(dir);
  expect(sources.map((s) => [s.fileName, s.sourceId, s.format, s.sizeBytes])).toEqual([
    ["a-lecture.m4a", "a-lecture", "m4a", 2],
    ["b-talk.MP3", "b-talk", "mp3", 1],
  ]);
  expect((await discoverTranscripts(dir)).map((s) => s.fileName)).toEqual(["notes.txt"]);
});

test("a missing input directory is empty", async () => {
  expect(await discoverSources(path.join(os.tmpdir(), "chunkscribe-does-not-exist", "input"))).toEqual([]);
});

test("explicit file paths become sources", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chunkscribe-input-"));
  const file = path.join(dir, "lecture.wav");
  fs.writeFileSync(file, "abc");

  await expect(sourceFromPath(file)).resolves.toEqual({
    sourceId: "lecture",
    path: file,
    fileName: "lecture.wav",
    format: "wav",
    sizeBytes: 3,
  });
  await expect(sourceFromPath(dir)).rejects.toThrow(`Not a file: ${dir}`);
});
