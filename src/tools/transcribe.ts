/**
 * Stage 1: split → transcribe → assemble
 *
 * Usage:
 *   tsx src/tools/transcribe.ts [--input <dir>] [--file <path> ...] [options]
 *
 * Options:
 *   --input <dir>      Directory of audio files (default: INPUT_DIR or ./input)
 *   --file <path>      Transcribe only this file (repeatable; overrides --input)
 *   --work <dir>       Working directory for chunks and fragments (default: WORK_DIR)
 *   --output <dir>     Directory for assembled transcripts (default: TRANSCRIPTS_DIR)
 *   --keep-chunks      Keep chunk audio files after transcription
 *   --help
 *
 * Example:
 *   tsx src/tools/transcribe.ts --file ./input/lecture.mp3 --keep-chunks
 */

import { loadConfig, printConfigSnapshot, requireOpenAiKey } from "../config/env.js";
import type { Config } from "../config/types.js";
import { assertMediaToolsAvailable, FfmpegMediaTool } from "../media/ffmpeg.js";
import { discoverSources, sourceFromPath } from "../pipeline/discover.js";
import { openRun } from "../pipeline/runContext.js";
import { installShutdownHandler } from "../pipeline/shutdown.js";
import { runTranscriptionStage } from "../pipeline/transcribeStage.js";
import { createSttProvider, getSttProviderInfo } from "../stt/provider.js";
import { log } from "../utils/logger.js";

const bootLog = log.withScope("boot");

type Args = {
  input: string | null;
  files: string[];
  work: string | null;
  output: string | null;
  keepChunks: boolean;
  help: boolean;
};

function printHelp(): void {
  console.log(`
Stage 1: split → transcribe → assemble

Usage:
  tsx src/tools/transcribe.ts [--input <dir>] [--file <path> ...] [options]

Options:
  --input <dir>      Directory of audio files (mp3/m4a/wav)
  --file <path>      Transcribe only this file (repeatable)
  --work <dir>       Working directory for chunks and fragments
  --output <dir>     Directory for assembled transcripts
  --keep-chunks      Keep chunk audio files after transcription
  --help             Show this help
`);
}

function parseArgs(argv: string[]): Args {
  const args: Args = { input: null, files: [], work: null, output: null, keepChunks: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === "--help") {
      args.help = true;
    } else if (arg === "--keep-chunks") {
      args.keepChunks = true;
    } else if (arg === "--input" && value) {
      args.input = value;
      i++;
    } else if (arg === "--file" && value) {
      args.files.push(value);
      i++;
    } else if (arg === "--work" && value) {
      args.work = value;
      i++;
    } else if (arg === "--output" && value) {
      args.output = value;
      i++;
    } else {
      throw new Error(`Unknown or incomplete argument: ${arg}`);
    }
  }

  return args;
}

function applyArgs(cfg: Config, args: Args): Config {
  return {
    ...cfg,
    paths: {
      ...cfg.paths,
      inputDir: args.input ?? cfg.paths.inputDir,
      workDir: args.work ?? cfg.paths.workDir,
      transcriptsDir: args.output ?? cfg.paths.transcriptsDir,
    },
    split: { ...cfg.split, keepChunks: cfg.split.keepChunks || args.keepChunks },
  };
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return 0;
  }

  const cfg = applyArgs(loadConfig(), args);
  log.configure(cfg.logging);
  printConfigSnapshot(cfg);

  // Fail before touching any file if credentials or ffmpeg are missing.
  if (cfg.stt.provider === "openai") requireOpenAiKey(cfg);
  await assertMediaToolsAvailable(cfg.split.ffmpegPath, cfg.split.ffprobePath);

  const sources =
    args.files.length > 0
      ? await Promise.all(args.files.map((file) => sourceFromPath(file)))
      : await discoverSources(cfg.paths.inputDir);

  if (sources.length === 0) {
    bootLog.warn(`No audio files found in ${cfg.paths.inputDir}`);
    return 0;
  }

  const stt = await createSttProvider(cfg);
  bootLog.info(`STT provider: ${getSttProviderInfo(cfg).description}`);

  const run = openRun(cfg, "transcribe");
  const shutdown = installShutdownHandler();
  try {
    const report = await runTranscriptionStage(cfg, sources, {
      stt,
      mediaTool: new FfmpegMediaTool(cfg.split.ffmpegPath, cfg.split.ffprobePath),
      signal: shutdown.signal,
    });
    return run.finish(report);
  } finally {
    shutdown.dispose();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("❌", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
