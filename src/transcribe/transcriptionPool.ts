import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { describeError } from "../errors.js";
import { fragmentFilename, padIndex } from "../pipeline/naming.js";
import type { Chunk, SourceFile, TranscriptFragment } from "../pipeline/types.js";
import { logTransitions } from "../pool/logTransitions.js";
import type { PoolOptions } from "../pool/types.js";
import { runPool } from "../pool/workerPool.js";
import type { SttProvider } from "../stt/provider.js";
import { log } from "../utils/logger.js";

const sttLog = log.withScope("stt");

export type TranscribeChunksOptions = Omit<PoolOptions<string>, "onTransition"> & {
  stt: SttProvider;
  /** Fragment text files are written here as {sourcename}_{index}.txt. */
  workDir: string;
};

export type TranscribeChunksResult = {
  fragments: TranscriptFragment[];
  dropped: number[];
};

/**
 * Transcribe every chunk of one source through the worker pool.
 * Always returns one fragment per chunk, ordered by index; failures and
 * chunks dropped by a shutdown come back as `failed` fragments.
 */
export async function transcribeChunks(
  source: SourceFile,
  chunks: Chunk[],
  options: TranscribeChunksOptions,
): Promise<TranscribeChunksResult> {
  const { stt, workDir, ...poolOptions } = options;

  const result = await runPool(
    chunks.map((chunk) => ({ index: chunk.index, payload: chunk })),
    async (chunk) => {
      const audio = await readFile(chunk.path);
      const text = await stt.transcribe({
        audio,
        filename: path.basename(chunk.path),
        format: chunk.format,
      });
      await writeFile(path.join(workDir, fragmentFilename(chunk.sourceId, chunk.index)), text, "utf-8");
      return text;
    },
    {
      ...poolOptions,
      onTransition: logTransitions(sttLog, (index) => `${source.fileName}#${padIndex(index)}`),
    },
  );

  const fragments = chunks.map((chunk): TranscriptFragment => {
    const outcome = result.outcomes.get(chunk.index);
    if (outcome?.status === "succeeded") {
      return {
        sourceId: source.sourceId,
        index: chunk.index,
        status: "ok",
        text: outcome.value,
        attempts: outcome.attempts,
      };
    }
    return {
      sourceId: source.sourceId,
      index: chunk.index,
      status: "failed",
      error: outcome ? describeError(outcome.error.lastError) : "cancelled before transcription",
      attempts: outcome?.attempts ?? 0,
    };
  });

  const ok = fragments.filter((fragment) => fragment.status === "ok").length;
  sttLog.info(`${source.fileName}: ${ok}/${chunks.length} chunk(s) transcribed`, {
    dropped: result.dropped.length > 0 ? result.dropped : undefined,
  });

  return { fragments, dropped: result.dropped };
}
