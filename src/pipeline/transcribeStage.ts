import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { assembleTranscript } from "../assemble/assembler.js";
import type { Config } from "../config/types.js";
import { failureReason } from "../errors.js";
import type { MediaTool } from "../media/ffmpeg.js";
import { removeChunkFiles, splitSource } from "../media/splitter.js";
import { sleep as defaultSleep, SleepAborted } from "../pool/backoff.js";
import type { SttProvider } from "../stt/provider.js";
import { transcribeChunks } from "../transcribe/transcriptionPool.js";
import { log } from "../utils/logger.js";
import { SourceIdClaims, transcriptFilename } from "./naming.js";
import type { Chunk, FileOutcome, RunReport, SourceFile } from "./types.js";

const pipelineLog = log.withScope("pipeline");

export type TranscribeStageDeps = {
  stt: SttProvider;
  mediaTool: MediaTool;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => Date;
};

/**
 * Split, transcribe and assemble one source. Never throws: every failure is
 * folded into the returned outcome.
 */
export async function transcribeSource(
  cfg: Config,
  source: SourceFile,
  deps: TranscribeStageDeps,
): Promise<FileOutcome> {
  let chunks: Chunk[];
  try {
    chunks = await splitSource(
      source,
      {
        chunkDurationMs: cfg.split.chunkDurationMs,
        overlapMs: cfg.split.overlapMs,
        workDir: cfg.paths.workDir,
        format: cfg.split.format,
      },
      deps.mediaTool,
    );
  } catch (err) {
    pipelineLog.error(`${source.fileName}: split failed, skipping`, { error: failureReason(err) });
    return { file: source.fileName, status: "failed", gaps: [], reason: failureReason(err) };
  }

  try {
    const { fragments } = await transcribeChunks(source, chunks, {
      stt: deps.stt,
      workDir: cfg.paths.workDir,
      maxWorkers: cfg.stt.maxWorkers,
      retry: cfg.stt.retry,
      signal: deps.signal,
      sleep: deps.sleep,
      random: deps.random,
    });

    const transcript = assembleTranscript({
      sourceId: source.sourceId,
      chunkCount: chunks.length,
      fragments,
      options: cfg.assemble,
    });

    if (transcript.gaps.length === transcript.chunkCount) {
      const firstError = fragments.find((fragment) => fragment.status === "failed");
      return {
        file: source.fileName,
        status: "failed",
        chunks: chunks.length,
        gaps: transcript.gaps,
        reason: `all ${chunks.length} chunk(s) failed${firstError?.status === "failed" ? `: ${firstError.error}` : ""}`,
      };
    }

    await mkdir(cfg.paths.transcriptsDir, { recursive: true });
    const outputPath = path.join(cfg.paths.transcriptsDir, transcriptFilename(source.sourceId));
    await writeFile(outputPath, `${transcript.text}\n`, "utf-8");
    pipelineLog.info(`${source.fileName}: transcript written to ${outputPath}`, {
      trimmedJoins: transcript.trimmedJoins,
      gaps: transcript.gaps,
    });

    return {
      file: source.fileName,
      status: transcript.gaps.length > 0 ? "partial" : "success",
      chunks: chunks.length,
      gaps: transcript.gaps,
      outputPath,
    };
  } catch (err) {
    pipelineLog.error(`${source.fileName}: transcription failed`, { error: failureReason(err) });
    return { file: source.fileName, status: "failed", chunks: chunks.length, gaps: [], reason: failureReason(err) };
  } finally {
    if (!cfg.split.keepChunks) {
      await removeChunkFiles(chunks);
    }
  }
}

/**
 * Stage 1 over every source, one file after another. A failed file never stops
 * its siblings; after shutdown the remaining files are reported as not processed.
 */
export async function runTranscriptionStage(
  cfg: Config,
  sources: SourceFile[],
  deps: TranscribeStageDeps,
): Promise<RunReport> {
  const now = deps.now ?? (() => new Date());
  const wait = deps.sleep ?? defaultSleep;
  const startedAt = now().toISOString();
  const files: FileOutcome[] = [];
  const claims = new SourceIdClaims();

  pipelineLog.info(`${sources.length} audio file(s) found`, { files: sources.map((s) => s.fileName) });

  for (const [position, source] of sources.entries()) {
    if (deps.signal?.aborted) {
      files.push({ file: source.fileName, status: "failed", gaps: [], reason: "not processed: shutdown requested" });
      continue;
    }

    const duplicate = claims.claim(source.sourceId, source.fileName);
    if (duplicate) {
      pipelineLog.error(`${source.fileName}: skipped, ${duplicate}`);
      files.push({ file: source.fileName, status: "failed", gaps: [], reason: duplicate });
      continue;
    }

    pipelineLog.info(`Transcribing ${source.fileName} (${position + 1}/${sources.length})`);
    files.push(await transcribeSource(cfg, source, deps));

    const interval = cfg.pipeline.fileIntervalMs;
    if (interval > 0 && position < sources.length - 1 && !deps.signal?.aborted) {
      pipelineLog.info(`Pausing ${interval}ms before the next file`);
      try {
        await wait(interval, deps.signal);
      } catch (err) {
        if (!(err instanceof SleepAborted)) throw err;
      }
    }
  }

  return {
    stage: "transcribe",
    startedAt,
    finishedAt: now().toISOString(),
    cancelled: deps.signal?.aborted === true,
    files,
  };
}
