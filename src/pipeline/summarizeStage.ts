import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { findGapMarkers } from "../assemble/assembler.js";
import type { Config } from "../config/types.js";
import { failureReason } from "../errors.js";
import type { LlmCall } from "../llm/client.js";
import { summarizeDocuments } from "../summarize/summarizer.js";
import { log } from "../utils/logger.js";
import { SourceIdClaims, summaryFilename } from "./naming.js";
import type { FileOutcome, RunReport, SourceFile, TextDocument } from "./types.js";

const pipelineLog = log.withScope("pipeline");

export type SummarizeStageDeps = {
  callLlm: LlmCall;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => Date;
};

/**
 * Stage 2: one summary per transcript file. Transcripts that still carry gap
 * markers are summarized anyway and reported as partial. A transcript that
 * cannot be read or whose summary cannot be written fails on its own.
 */
export async function runSummarizationStage(
  cfg: Config,
  transcripts: SourceFile[],
  deps: SummarizeStageDeps,
): Promise<RunReport> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now().toISOString();

  // One slot per transcript, so the report keeps input order.
  const outcomes: (FileOutcome | undefined)[] = transcripts.map(() => undefined);
  const fail = (position: number, fileName: string, reason: string) => {
    pipelineLog.error(`${fileName}: summary skipped`, { reason });
    outcomes[position] = { file: fileName, status: "failed", gaps: [], reason };
  };

  const documents: TextDocument[] = [];
  const pending: { position: number; file: SourceFile; gaps: number[] }[] = [];
  const claims = new SourceIdClaims();
  for (const [position, file] of transcripts.entries()) {
    const duplicate = claims.claim(file.sourceId, file.fileName);
    if (duplicate) {
      fail(position, file.fileName, duplicate);
      continue;
    }

    let text: string;
    try {
      text = await readFile(file.path, "utf-8");
    } catch (err) {
      fail(position, file.fileName, failureReason(err));
      continue;
    }

    const gaps = findGapMarkers(text);
    if (gaps.length > 0) {
      pipelineLog.warn(`${file.fileName}: transcript has ${gaps.length} gap(s), summarizing what is there`);
    }
    pending.push({ position, file, gaps });
    documents.push({ documentId: file.sourceId, path: file.path, text });
  }

  pipelineLog.info(`${documents.length} transcript(s) to summarize`, { model: cfg.llm.model });

  const results = await summarizeDocuments(documents, {
    callLlm: deps.callLlm,
    model: cfg.llm.model,
    targetChars: cfg.summary.targetChars,
    maxInputChars: cfg.summary.maxInputChars,
    reducePartials: cfg.summary.reducePartials,
    maxWorkers: cfg.summary.maxWorkers,
    retry: cfg.summary.retry,
    signal: deps.signal,
    sleep: deps.sleep,
    random: deps.random,
  });

  for (const [index, result] of results.entries()) {
    const entry = pending[index];
    if (!entry) continue;
    const { position, file, gaps } = entry;
    if (result.status === "failed") {
      fail(position, file.fileName, result.reason);
      continue;
    }

    const outputPath = path.join(cfg.paths.summariesDir, summaryFilename(result.documentId));
    try {
      await mkdir(cfg.paths.summariesDir, { recursive: true });
      await writeFile(outputPath, `${result.summary.text}\n`, "utf-8");
    } catch (err) {
      fail(position, file.fileName, failureReason(err));
      continue;
    }
    pipelineLog.info(`${file.fileName}: summary written to ${outputPath}`, {
      parts: result.summary.parts,
      reduced: result.summary.reduced,
    });

    outcomes[position] = {
      file: file.fileName,
      status: gaps.length > 0 ? "partial" : "success",
      gaps,
      outputPath,
    };
  }

  const files = outcomes.map(
    (outcome, position): FileOutcome =>
      outcome ?? {
        file: transcripts[position]?.fileName ?? `transcript ${position}`,
        status: "failed",
        gaps: [],
        reason: "not summarized",
      },
  );

  return {
    stage: "summarize",
    startedAt,
    finishedAt: now().toISOString(),
    cancelled: deps.signal?.aborted === true,
    files,
  };
}
