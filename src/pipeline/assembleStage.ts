import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { assembleTranscript, readFragmentsFromDirectory } from "../assemble/assembler.js";
import type { Config } from "../config/types.js";
import { failureReason } from "../errors.js";
import { log } from "../utils/logger.js";
import { SourceIdClaims, transcriptFilename } from "./naming.js";
import type { FileOutcome, RunReport, TranscriptFragment } from "./types.js";

const pipelineLog = log.withScope("pipeline");

/**
 * Rebuild transcripts from fragment files already in the working directory,
 * without calling any remote service. `chunkCount` (when known) lets trailing
 * missing fragments show up as gaps too.
 */
export async function runAssembleStage(
  cfg: Config,
  sourceIds: string[],
  opts: { chunkCount?: number; now?: () => Date } = {},
): Promise<RunReport> {
  const now = opts.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const files: FileOutcome[] = [];

  const claims = new SourceIdClaims();
  for (const sourceId of sourceIds) {
    const fail = (reason: string) => {
      pipelineLog.error(`${sourceId}: not reassembled`, { reason });
      files.push({ file: sourceId, status: "failed", gaps: [], reason });
    };

    const duplicate = claims.claim(sourceId, sourceId);
    if (duplicate) {
      fail(duplicate);
      continue;
    }

    let fragments: TranscriptFragment[];
    try {
      fragments = await readFragmentsFromDirectory(cfg.paths.workDir, sourceId);
    } catch (err) {
      fail(failureReason(err));
      continue;
    }
    if (fragments.length === 0) {
      fail(`no fragments in ${cfg.paths.workDir}`);
      continue;
    }

    const transcript = assembleTranscript({
      sourceId,
      chunkCount: opts.chunkCount ?? 0,
      fragments,
      options: cfg.assemble,
    });

    const outputPath = path.join(cfg.paths.transcriptsDir, transcriptFilename(sourceId));
    try {
      await mkdir(cfg.paths.transcriptsDir, { recursive: true });
      await writeFile(outputPath, `${transcript.text}\n`, "utf-8");
    } catch (err) {
      fail(failureReason(err));
      continue;
    }
    pipelineLog.info(`${sourceId}: reassembled ${fragments.length} fragment(s) into ${outputPath}`);

    files.push({
      file: sourceId,
      status: transcript.gaps.length > 0 ? "partial" : "success",
      chunks: transcript.chunkCount,
      gaps: transcript.gaps,
      outputPath,
    });
  }

  return {
    stage: "assemble",
    startedAt,
    finishedAt: now().toISOString(),
    cancelled: false,
    files,
  };
}
