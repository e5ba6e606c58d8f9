import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import {
  assembleTranscript,
  findGapMarkers,
  gapMarker,
  listFragmentSources,
  readFragmentsFromDirectory,
} from "../../assemble/assembler.js";
import { planChunks } from "../../media/splitPlan.js";
import type { TranscriptFragment } from "../../pipeline/types.js";

const noTrim = { trimEnabled: false, windowChars: 400, minMatchChars: 12 };
const withTrim = { ...noTrim, trimEnabled: true };

function ok(index: number, text: string): TranscriptFragment {
  return { sourceId: "lecture", index, status: "ok", text, attempts: 1 };
}

function failed(index: number): TranscriptFragment {
  return { sourceId: "lecture", index, status: "failed", error: "rate_limited: slow down", attempts: 4 };
}

test("fragments are joined by index whatever order they arrive in", () => {
  const result = assembleTranscript({
    sourceId: "lecture",
    chunkCount: 3,
    fragments: [ok(2, "third"), ok(0, "first"), ok(1, "second")],
    options: noTrim,
  });

  expect(result).toEqual({ sourceId: "lecture", text: "first\nsecond\nthird", chunkCount: 3, gaps: [], trimmedJoins: 0 });
});

test("a failed chunk becomes a gap marker in its position", () => {
  const result = assembleTranscript({
    sourceId: "lecture",
    chunkCount: 4,
    fragments: [ok(0, "one"), ok(1, "two"), failed(2), ok(3, "four")],
    options: noTrim,
  });

  expect(result.text).toBe("one\ntwo\n[[transcription gap: chunk 002]]\nfour");
  expect(result.gaps).toEqual([2]);
});

test("missing indices up to chunkCount are gaps too", () => {
  const result = assembleTranscript({ sourceId: "lecture", chunkCount: 3, fragments: [ok(0, "zero")], options: noTrim });
  expect(result.text).toBe(`zero\n${gapMarker(1)}\n${gapMarker(2)}`);
  expect(result.gaps).toEqual([1, 2]);
});

test("chunk count grows to cover the highest fragment index", () => {
  const result = assembleTranscript({ sourceId: "lecture", chunkCount: 0, fragments: [ok(1, "B")], options: noTrim });
  expect(result.chunkCount).toBe(2);
  expect(result.text).toBe("[[transcription gap: chunk 000]]\nB");
});

test("overlapping words at a boundary are trimmed once", () => {
  const result = assembleTranscript({
    sourceId: "lecture",
    chunkCount: 2,
    fragments: [
      ok(0, "We talked about the history of the city and its harbor"),
      ok(1, "the city and its harbor. Next we move to the museum."),
    ],
    options: withTrim,
  });

  expect(result.text).toBe("We talked about the history of the city and its harbor\nNext we move to the museum.");
  expect(result.trimmedJoins).toBe(1);
});

test("no trimming across a gap", () => {
  const result = assembleTranscript({
    sourceId: "lecture",
    chunkCount: 3,
    fragments: [ok(0, "about the city and its harbor"), failed(1), ok(2, "the city and its harbor again")],
    options: withTrim,
  });

  expect(result.text).toBe(`about the city and its harbor\n${gapMarker(1)}\nthe city and its harbor again`);
  expect(result.trimmedJoins).toBe(0);
});

test("the first fragment for an index wins", () => {
  const result = assembleTranscript({
    sourceId: "lecture",
    chunkCount: 1,
    fragments: [ok(0, "kept"), ok(0, "ignored")],
    options: noTrim,
  });
  expect(result.text).toBe("kept");
});

test("gap markers can be recovered from assembled text", () => {
  const text = `a ${gapMarker(3)} b ${gapMarker(1)} c ${gapMarker(3)}`;
  expect(findGapMarkers(text)).toEqual([1, 3]);
  expect(findGapMarkers("no gaps here")).toEqual([]);
});

test("fragments are read back from the working directory by source", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "chunkscribe-fragments-"));
  fs.writeFileSync(path.join(dir, "lecture_001.txt"), "second");
  fs.writeFileSync(path.join(dir, "lecture_000.txt"), "first");
  fs.writeFileSync(path.join(dir, "other_000.txt"), "elsewhere");
  fs.writeFileSync(path.join(dir, "lecture_000.mp3"), "audio");

  const fragments = await readFragmentsFromDirectory(dir, "lecture");
  expect(fragments.map((f) => [f.index, f.status === "ok" ? f.text : null])).toEqual([
    [0, "first"],
    [1, "second"],
  ]);
  expect(await listFragmentSources(dir)).toEqual(["lecture", "other"]);
});

// One word per second of audio: w0 is spoken during second 0, w1 during second 1, ...
const spokenWords = Array.from({ length: 200 }, (_, second) => `w${second}`);
const spans = planChunks(200_000, { chunkDurationMs: 60_000, overlapMs: 5_000 });

function wordsBetween(startMs: number, endMs: number): string {
  return spokenWords.slice(startMs / 1000, endMs / 1000).join(" ");
}

function collapseWhitespace(text: string): string {
  return text.trim().split(/\s+/).join(" ");
}

test("fragments of the non-shared audio reassemble to the whole recording", () => {
  expect(spans.map((span) => [span.startMs, span.endMs])).toEqual([
    [0, 60_000],
    [55_000, 120_000],
    [115_000, 180_000],
    [175_000, 200_000],
  ]);
  const fragments = spans.map((span) => ok(span.index, wordsBetween(span.startMs + span.overlapMs, span.endMs)));

  const result = assembleTranscript({ sourceId: "lecture", chunkCount: spans.length, fragments, options: noTrim });

  expect(result.gaps).toEqual([]);
  expect(collapseWhitespace(result.text)).toBe(spokenWords.join(" "));
});

test("trimming removes the shared audio's words exactly once at every boundary", () => {
  const fragments = spans.map((span) => ok(span.index, wordsBetween(span.startMs, span.endMs)));

  const result = assembleTranscript({ sourceId: "lecture", chunkCount: spans.length, fragments, options: withTrim });

  expect(result.trimmedJoins).toBe(3);
  expect(collapseWhitespace(result.text)).toBe(spokenWords.join(" "));
});
