/**
 * Stage 2: summarize assembled transcripts
 *
 * Usage:
 *   tsx src/tools/summarize.ts [--input <dir>] [--file <path> ...] [options]
 *
 * Options:
 *   --input <dir>      Directory of transcripts (default: TRANSCRIPTS_DIR or ./output)
 *   --file <path>      Summarize only this transcript (repeatable; overrides --input)
 *   --output <dir>     Directory for summaries (default: SUMMARIES_DIR)
 *   --model <id>       Override LLM_MODEL
 *   --target <chars>   Override SUMMARY_TARGET_CHARS
 *   --no-reduce        Concatenate partial summaries instead of merging them
 *   --help
 *
 * Example:
 *   tsx src/tools/summarize.ts --file ./output/lecture.txt --target 1200
 */

import { loadConfig, printConfigSnapshot } from "../config/env.js";
import type { Config } from "../config/types.js";
import { createLlmCall } from "../llm/client.js";
import { discoverTranscripts, sourceFromPath } from "../pipeline/discover.js";
import { openRun } from "../pipeline/runContext.js";
import { installShutdownHandler } from "../pipeline/shutdown.js";
import { runSummarizationStage } from "../pipeline/summarizeStage.js";
import { log } from "../utils/logger.js";

const bootLog = log.withScope("boot");

type Args = {
  input: string | null;
  files: string[];
  output: string | null;
  model: string | null;
  target: number | null;
  noReduce: boolean;
  help: boolean;
};

function printHelp(): void {
  console.log(`
Stage 2: summarize assembled transcripts

Usage:
  tsx src/tools/summarize.ts [--input <dir>] [--file <path> ...] [options]

Options:
  --input <dir>      Directory of transcripts (.txt)
  --file <path>      Summarize only this transcript (repeatable)
  --output <dir>     Directory for summaries
  --model <id>       Model identifier (default: LLM_MODEL)
  --target <chars>   Target summary length in characters
  --no-reduce        Concatenate partial summaries instead of merging them
  --help             Show this help
`);
}

function parseArgs(argv: string[]): Args {
  const args: Args = {
    input: null,
    files: [],
    output: null,
    model: null,
    target: null,
    noReduce: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === "--help") {
      args.help = true;
    } else if (arg === "--no-reduce") {
      args.noReduce = true;
    } else if (arg === "--input" && value) {
      args.input = value;
      i++;
    } else if (arg === "--file" && value) {
      args.files.push(value);
      i++;
    } else if (arg === "--output" && value) {
      args.output = value;
      i++;
    } else if (arg === "--model" && value) {
      args.model = value;
      i++;
    } else if (arg === "--target" && value) {
      const target = Number(value);
      if (!Number.isInteger(target) || target <= 0) {
        throw new Error(`Invalid --target '${value}'. Expected a positive integer.`);
      }
      args.target = target;
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
      transcriptsDir: args.input ?? cfg.paths.transcriptsDir,
      summariesDir: args.output ?? cfg.paths.summariesDir,
    },
    llm: { ...cfg.llm, model: args.model ?? cfg.llm.model },
    summary: {
      ...cfg.summary,
      targetChars: args.target ?? cfg.summary.targetChars,
      reducePartials: cfg.summary.reducePartials && !args.noReduce,
    },
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

  // Throws ConfigError when LLM_PROVIDER=openai and no key is set.
  const callLlm = createLlmCall(cfg);

  const transcripts =
    args.files.length > 0
      ? await Promise.all(args.files.map((file) => sourceFromPath(file)))
      : await discoverTranscripts(cfg.paths.transcriptsDir);

  if (transcripts.length === 0) {
    bootLog.warn(`No transcripts found in ${cfg.paths.transcriptsDir}`);
    return 0;
  }

  const run = openRun(cfg, "summarize");
  const shutdown = installShutdownHandler();
  try {
    const report = await runSummarizationStage(cfg, transcripts, {
      callLlm,
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
