/**
 * ffmpeg / ffprobe subprocess wrapper.
 *
 * Binaries come from FFMPEG_PATH / FFPROBE_PATH or PATH. Every failure while
 * working on a source surfaces as SplitError (fatal for that source only);
 * the startup check surfaces as ConfigError.
 */

import { spawn } from "node:child_process";
import { ConfigError, SplitError } from "../errors.js";
import { log } from "../utils/logger.js";

const splitLog = log.withScope("split");

export type SegmentRequest = {
  inputPath: string;
  outputPath: string;
  startMs: number;
  durationMs: number;
  format: string;
};

export interface MediaTool {
  probeDurationMs(inputPath: string): Promise<number>;
  extractSegment(request: SegmentRequest): Promise<void>;
}

type ProcessResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

function runProcess(command: string, args: string[]): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({ code, stdout, stderr });
    });
  });
}

function isMissingExecutable(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? "";
}

function toSeconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function codecArgs(format: string): string[] {
  switch (format) {
    case "wav":
      return ["-c:a", "pcm_s16le", "-ar", "16000"];
    case "m4a":
      return ["-c:a", "aac", "-b:a", "64k"];
    default:
      return ["-c:a", "libmp3lame", "-b:a", "64k"];
  }
}

export class FfmpegMediaTool implements MediaTool {
  constructor(
    private readonly ffmpegPath: string = "ffmpeg",
    private readonly ffprobePath: string = "ffprobe",
  ) {}

  async probeDurationMs(inputPath: string): Promise<number> {
    const args = [
      "-v", "error",
      "-show_entries", "format=duration",
      "-of", "default=noprint_wrappers=1:nokey=1",
      inputPath,
    ];
    const result = await this.run(this.ffprobePath, args, inputPath);
    const seconds = Number.parseFloat(result.stdout.trim());
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new SplitError(`Could not determine audio duration of ${inputPath}`, inputPath);
    }
    return Math.round(seconds * 1000);
  }

  async extractSegment(request: SegmentRequest): Promise<void> {
    const args = [
      "-hide_banner",
      "-loglevel", "error",
      "-ss", toSeconds(request.startMs),
      "-t", toSeconds(request.durationMs),
      "-i", request.inputPath,
      "-vn",
      "-ac", "1",
      ...codecArgs(request.format),
      "-y", // Overwrite output
      request.outputPath,
    ];
    splitLog.trace(`${this.ffmpegPath} ${args.join(" ")}`);
    await this.run(this.ffmpegPath, args, request.inputPath);
  }

  private async run(command: string, args: string[], sourcePath: string): Promise<ProcessResult> {
    let result: ProcessResult;
    try {
      result = await runProcess(command, args);
    } catch (err) {
      if (isMissingExecutable(err)) {
        throw new SplitError(`${command} not found. Install FFmpeg or set FFMPEG_PATH/FFPROBE_PATH`, sourcePath, {
          cause: err,
        });
      }
      throw new SplitError(`${command} spawn failed: ${err instanceof Error ? err.message : String(err)}`, sourcePath, {
        cause: err,
      });
    }

    if (result.code !== 0) {
      throw new SplitError(
        `${command} exited with code ${result.code ?? "null"}: ${lastLine(result.stderr) || "no output"}`,
        sourcePath,
      );
    }
    return result;
  }
}

/**
 * Startup check: both binaries must answer `-version`.
 */
export async function assertMediaToolsAvailable(ffmpegPath: string, ffprobePath: string): Promise<void> {
  for (const command of [ffmpegPath, ffprobePath]) {
    let result: ProcessResult;
    try {
      result = await runProcess(command, ["-version"]);
    } catch (err) {
      throw new ConfigError(
        `${command} not found (${err instanceof Error ? err.message : String(err)}). ` +
          `Install FFmpeg and ensure it's in your PATH, or set FFMPEG_PATH/FFPROBE_PATH.\n` +
          `Windows: choco install ffmpeg\n` +
          `macOS: brew install ffmpeg\n` +
          `Linux: apt install ffmpeg`,
      );
    }
    if (result.code !== 0) {
      throw new ConfigError(`${command} -version exited with code ${result.code ?? "null"}`);
    }
  }
}
