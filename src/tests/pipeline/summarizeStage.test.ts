import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { expect, test } from "vitest";
import { loadConfig } from "../../config/env.js";
import { RemoteError } from "../../errors.js";
import { discoverTranscripts, sourceFromPath } from "../../pipeline/discover.js";
import { formatOutcomeLine } from "../../pipeline/report.js";
import { runSummarizationStage } from "../../pipeline/summarizeStage.js";

function makeWorkspace() {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "chunkscribe-stage2-"));
  const transcripts = path.join(root, "output");
  const summaries = path.join(root, "summaries");
  fs.mkdirSync(transcripts);
  const cfg = loadConfig({
    TRANSCRIPTS_DIR: transcripts,
    SUMMARIES_DIR: summaries,
    LLM_PROVIDER: "debug",
    SUMMARY_MAX_RETRIES: "0",
  });
  return { transcripts, summaries, cfg };
}

test("each transcript gets a summary file; gaps make it partial", async () => {
  const { transcripts, summaries, cfg } = makeWorkspace();
  fs.writeFileSync(path.join(transcripts, "talk.txt"), "Intro\n[[transcription gap: chunk 001]]\nOutro\n");
  fs.writeFileSync(path.join(transcripts, "clean.txt"), "All good.\n");

  const report = await runSummarizationStage(cfg, await discoverTranscripts(transcripts), {
    callLlm: async () => "summary text",
  });

  expect(report.stage).toBe("summarize");
  expect(report.files.map(formatOutcomeLine)).toEqual(["clean.txt: success", "talk.txt: partial (1 gap at index 1)"]);
  expect(fs.readFileSync(path.join(summaries, "summary_talk.txt"), "utf-8")).toBe("summary text\n");
  expect(fs.readFileSync(path.join(summaries, "summary_clean.txt"), "utf-8")).toBe("summary text\n");
});

test("a failed summary is reported and does not stop the others", async () => {
  const { transcripts, summaries, cfg } = makeWorkspace();
  fs.writeFileSync(path.join(transcripts, "a.txt"), "first transcript");
  fs.writeFileSync(path.join(transcripts, "b.txt"), "second transcript");

  const report = await runSummarizationStage(cfg, await discoverTranscripts(transcripts), {
    callLlm: async (input) => {
      if (input.userPrompt.includes("first transcript")) {
        throw new RemoteError("invalid_input", "context length exceeded", { status: 400 });
      }
      return "ok";
    },
  });

  expect(report.files.map(formatOutcomeLine)).toEqual([
    "a.txt: failed (invalid_input: context length exceeded)",
    "b.txt: success",
  ]);
  expect(fs.readdirSync(summaries)).toEqual(["summary_b.txt"]);
});

test("a summary that cannot be written fails that transcript only", async () => {
  const { transcripts, summaries, cfg } = makeWorkspace();
  fs.writeFileSync(path.join(transcripts, "a.txt"), "first transcript");
  fs.writeFileSync(path.join(transcripts, "b.txt"), "second transcript");
  fs.mkdirSync(path.join(summaries, "summary_a.txt"), { recursive: true });

  const report = await runSummarizationStage(cfg, await discoverTranscripts(transcripts), {
    callLlm: async () => "ok",
  });

  expect(report.files.map((f) => [f.file, f.status])).toEqual([
    ["a.txt", "failed"],
    ["b.txt", "success"],
  ]);
  expect(report.files[0]?.reason).toContain("EISDIR");
  expect(fs.readFileSync(path.join(summaries, "summary_b.txt"), "utf-8")).toBe("ok\n");
});

test("a transcript that cannot be read fails alone", async () => {
  const { transcripts, cfg } = makeWorkspace();
  fs.writeFileSync(path.join(transcripts, "b.txt"), "second transcript");
  const vanished = { sourceId: "a", path: path.join(transcripts, "a.txt"), fileName: "a.txt", format: "txt", sizeBytes: 0 };

  const report = await runSummarizationStage(cfg, [vanished, ...(await discoverTranscripts(transcripts))], {
    callLlm: async () => "ok",
  });

  expect(report.files.map((f) => [f.file, f.status])).toEqual([
    ["a.txt", "failed"],
    ["b.txt", "success"],
  ]);
  expect(report.files[0]?.reason).toContain("ENOENT");
});

test("transcripts with the same name in different folders are not summarized into one file", async () => {
  const { transcripts, summaries, cfg } = makeWorkspace();
  fs.mkdirSync(path.join(transcripts, "old"));
  fs.writeFileSync(path.join(transcripts, "talk.txt"), "new recording");
  fs.writeFileSync(path.join(transcripts, "old", "talk.txt"), "old recording");

  const sources = [
    await sourceFromPath(path.join(transcripts, "talk.txt")),
    await sourceFromPath(path.join(transcripts, "old", "talk.txt")),
  ];
  const prompts: string[] = [];
  const report = await runSummarizationStage(cfg, sources, {
    callLlm: async (input) => {
      prompts.push(input.userPrompt);
      return "summary";
    },
  });

  expect(report.files.map(formatOutcomeLine)).toEqual([
    "talk.txt: success",
    'talk.txt: failed (duplicate source id "talk", already used by talk.txt)',
  ]);
  expect(prompts).toHaveLength(1);
  expect(prompts[0]).toContain("new recording");
  expect(fs.readdirSync(summaries)).toEqual(["summary_talk.txt"]);
});
