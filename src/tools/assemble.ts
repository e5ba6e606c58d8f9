/**
 * Rebuild transcripts from fragment files in the working directory
 * (no remote calls). Useful after editing a fragment by hand or after a run
 * that was interrupted before assembly.
 *
 * Usage:
 *   tsx src/tools/assemble.ts [--source <name> ...] [--chunks <n>] [--work <dir>] [--output <dir>] [--no-trim]
 */

import { listFragmentSources } from "../assemble/assembler.js";
import { loadConfig } from "../config/env.js";
import { runAssembleStage } from "../pipeline/assembleStage.js";
import { openRun } from "../pipeline/runContext.js";
import { log } from "../utils/logger.js";

const bootLog = log.withScope("boot");

type Args = {
  sources: string[];
  chunks: number | null;
  work: string | null;
  output: string | null;
  noTrim: boolean;
};

function parseArgs(argv: string[]): Args {
  const args: Args = { sources: [], chunks: null, work: null, output: null, noTrim: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === "--no-trim") {
      args.noTrim = true;
    } else if (arg === "--source" && value) {
      args.sources.push(value);
      i++;
    } else if (arg === "--chunks" && value) {
      const chunks = Number(value);
      if (!Number.isInteger(chunks) || chunks <= 0) {
        throw new Error(`Invalid --chunks '${value}'. Expected a positive integer.`);
      }
      args.chunks = chunks;
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

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const base = loadConfig();
  const cfg = {
    ...base,
    paths: {
      ...base.paths,
      workDir: args.work ?? base.paths.workDir,
      transcriptsDir: args.output ?? base.paths.transcriptsDir,
    },
    assemble: { ...base.assemble, trimEnabled: base.assemble.trimEnabled && !args.noTrim },
  };
  log.configure(cfg.logging);

  const sourceIds = args.sources.length > 0 ? args.sources : await listFragmentSources(cfg.paths.workDir);
  if (sourceIds.length === 0) {
    bootLog.warn(`No fragment files found in ${cfg.paths.workDir}`);
    return 0;
  }

  const run = openRun(cfg, "assemble");
  const report = await runAssembleStage(cfg, sourceIds, { chunkCount: args.chunks ?? undefined });
  return run.finish(report);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("❌", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
