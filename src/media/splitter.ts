import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { SplitError } from "../errors.js";
import { chunkFilename } from "../pipeline/naming.js";
import type { Chunk, SourceFile } from "../pipeline/types.js";
import { log } from "../utils/logger.js";
import { formatOffset, formatSpan } from "../utils/timestamps.js";
import type { MediaTool } from "./ffmpeg.js";
import { planChunks, type SplitWindow } from "./splitPlan.js";

const splitLog = log.withScope("split");

export type SplitOptions = SplitWindow & {
  workDir: string;
  format: string;
};

/**
 * Cut one source into overlapping chunk files under workDir.
 * Any tool failure is rethrown as SplitError after the chunks written so far
 * are removed; the source is never touched.
 */
export async function splitSource(
  source: SourceFile,
  options: SplitOptions,
  tool: MediaTool,
): Promise<Chunk[]> {
  await mkdir(options.workDir, { recursive: true });

  const durationMs = await tool.probeDurationMs(source.path);
  const spans = planChunks(durationMs, options);
  if (spans.length === 0) {
    throw new SplitError(`No audio to split in ${source.fileName}`, source.path);
  }

  splitLog.info(
    `${source.fileName}: ${formatOffset(durationMs)} → ${spans.length} chunk(s) of ${formatOffset(options.chunkDurationMs)} (overlap ${formatOffset(options.overlapMs)})`,
  );

  const chunks: Chunk[] = [];
  for (const span of spans) {
    const outputPath = path.join(options.workDir, chunkFilename(source.sourceId, span.index, options.format));
    try {
      await tool.extractSegment({
        inputPath: source.path,
        outputPath,
        startMs: span.startMs,
        durationMs: span.endMs - span.startMs,
        format: options.format,
      });
    } catch (err) {
      // Leave nothing behind for a source that could not be split completely.
      await removeChunkFiles(chunks);
      await rm(outputPath, { force: true });
      if (err instanceof SplitError) throw err;
      throw new SplitError(
        `Failed to extract chunk ${span.index} of ${source.fileName}: ${err instanceof Error ? err.message : String(err)}`,
        source.path,
        { cause: err },
      );
    }

    chunks.push({ ...span, sourceId: source.sourceId, path: outputPath, format: options.format });
    splitLog.debug(`Chunk ${span.index + 1}/${spans.length}: ${formatSpan(span.startMs, span.endMs)}`, {
      path: outputPath,
    });
  }

  return chunks;
}

export async function removeChunkFiles(chunks: Chunk[]): Promise<void> {
  await Promise.all(chunks.map((chunk) => rm(chunk.path, { force: true })));
}
