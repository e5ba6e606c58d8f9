import "dotenv/config";
import { ConfigError } from "../errors.js";
import { log } from "../utils/logger.js";
import type {
  Config,
  LlmProviderName,
  LogFormat,
  LogLevel,
  RetryPolicy,
  SttProviderName,
} from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

type Env = Record<string, string | undefined>;

function readers(env: Env) {
  function opt(name: string): string | undefined {
    const v = env[name];
    return v && v.trim() ? v.trim() : undefined;
  }

  function optNumber(name: string, def: number): number {
    const v = opt(name);
    if (!v) return def;
    const n = Number(v);
    if (!Number.isFinite(n)) throw new ConfigError(`Invalid number for ${name}: ${v}`);
    return n;
  }

  function optInt(name: string, def: number, min: number): number {
    const n = optNumber(name, def);
    if (!Number.isInteger(n) || n < min) {
      throw new ConfigError(`Invalid value for ${name}: ${n}. Expected an integer >= ${min}`);
    }
    return n;
  }

  function optBool(name: string, def: boolean): boolean {
    const v = opt(name);
    if (!v) return def;
    if (["1", "true", "yes", "on"].includes(v.toLowerCase())) return true;
    if (["0", "false", "no", "off"].includes(v.toLowerCase())) return false;
    throw new ConfigError(`Invalid boolean for ${name}: ${v}`);
  }

  function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
    const v = opt(name);
    if (!v) return def;
    const match = allowed.find((candidate) => candidate === v);
    if (match) return match;
    throw new ConfigError(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
  }

  return { opt, optNumber, optInt, optBool, enumOf };
}

function retryPolicy(
  r: ReturnType<typeof readers>,
  prefix: "STT" | "SUMMARY",
  jitterRatio: number,
): RetryPolicy {
  const baseDelayMs = r.optInt(`${prefix}_BACKOFF_BASE_MS`, 1000, 0);
  const maxDelayMs = r.optInt(`${prefix}_BACKOFF_MAX_MS`, 30000, 0);
  if (maxDelayMs < baseDelayMs) {
    throw new ConfigError(`${prefix}_BACKOFF_MAX_MS (${maxDelayMs}) must be >= ${prefix}_BACKOFF_BASE_MS (${baseDelayMs})`);
  }
  return {
    maxRetries: r.optInt(`${prefix}_MAX_RETRIES`, 3, 0),
    baseDelayMs,
    maxDelayMs,
    jitterRatio,
  };
}

export function loadConfig(env: Env = process.env): Config {
  const r = readers(env);

  const chunkSec = r.optNumber("SPLIT_CHUNK_SEC", 20 * 60);
  const overlapSec = r.optNumber("SPLIT_OVERLAP_SEC", 20);
  if (chunkSec <= 0) {
    throw new ConfigError(`SPLIT_CHUNK_SEC must be positive, got ${chunkSec}`);
  }
  if (overlapSec < 0 || overlapSec >= chunkSec) {
    throw new ConfigError(
      `SPLIT_OVERLAP_SEC must be in [0, SPLIT_CHUNK_SEC), got ${overlapSec} with SPLIT_CHUNK_SEC=${chunkSec}`,
    );
  }

  const jitterRatio = r.optNumber("BACKOFF_JITTER", 0.2);
  if (jitterRatio < 0 || jitterRatio > 1) {
    throw new ConfigError(`BACKOFF_JITTER must be in [0, 1], got ${jitterRatio}`);
  }

  const sttProvider = r.enumOf<SttProviderName>("STT_PROVIDER", ["openai", "debug"] as const, "openai");
  const llmProvider = r.enumOf<LlmProviderName>("LLM_PROVIDER", ["openai", "debug"] as const, "openai");

  const cfg: Config = {
    openai: {
      // Checked by requireOpenAiKey() once a stage knows it talks to OpenAI.
      apiKey: r.opt("OPENAI_API_KEY") ?? r.opt("API_KEY"),
    },

    paths: {
      inputDir: r.opt("INPUT_DIR") ?? "input",
      workDir: r.opt("WORK_DIR") ?? "converted",
      transcriptsDir: r.opt("TRANSCRIPTS_DIR") ?? "output",
      summariesDir: r.opt("SUMMARIES_DIR") ?? "summaries",
      logDir: r.opt("LOG_DIR") ?? "logs",
    },

    split: {
      chunkDurationMs: Math.round(chunkSec * 1000),
      overlapMs: Math.round(overlapSec * 1000),
      format: r.enumOf("SPLIT_FORMAT", ["mp3", "m4a", "wav"] as const, "mp3"),
      keepChunks: r.optBool("KEEP_CHUNKS", false),
      ffmpegPath: r.opt("FFMPEG_PATH") ?? "ffmpeg",
      ffprobePath: r.opt("FFPROBE_PATH") ?? "ffprobe",
    },

    stt: {
      provider: sttProvider,
      model: r.opt("STT_OPENAI_MODEL") ?? "whisper-1",
      language: r.opt("STT_LANGUAGE"),
      prompt: r.opt("STT_PROMPT"),
      maxWorkers: r.optInt("STT_MAX_WORKERS", 4, 1),
      retry: retryPolicy(r, "STT", jitterRatio),
    },

    assemble: {
      trimEnabled: r.optBool("ASSEMBLE_TRIM", true),
      windowChars: r.optInt("ASSEMBLE_TRIM_WINDOW_CHARS", 400, 1),
      minMatchChars: r.optInt("ASSEMBLE_TRIM_MIN_CHARS", 12, 1),
    },

    llm: {
      provider: llmProvider,
      model: r.opt("LLM_MODEL") ?? "gpt-4-turbo",
      temperature: r.optNumber("LLM_TEMPERATURE", 0.3),
      maxTokens: r.optInt("LLM_MAX_TOKENS", 4096, 1),
    },

    summary: {
      targetChars: r.optInt("SUMMARY_TARGET_CHARS", 2000, 1),
      maxInputChars: r.optInt("SUMMARY_MAX_INPUT_CHARS", 60000, 1),
      reducePartials: r.optBool("SUMMARY_REDUCE", true),
      maxWorkers: r.optInt("SUMMARY_MAX_WORKERS", 2, 1),
      retry: retryPolicy(r, "SUMMARY", jitterRatio),
    },

    pipeline: {
      fileIntervalMs: r.optInt("PIPELINE_FILE_INTERVAL_MS", 0, 0),
    },

    logging: {
      level: r.enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: r.opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: r.enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  return cfg;
}

/**
 * Returns the API key, or throws before any file is touched when a stage
 * needs OpenAI and no key is configured.
 */
export function requireOpenAiKey(cfg: Config): string {
  const key = cfg.openai.apiKey;
  if (!key) {
    throw new ConfigError("Missing required env var: OPENAI_API_KEY");
  }
  return key;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    OPENAI_API_KEY: cfg.openai.apiKey,
    INPUT_DIR: cfg.paths.inputDir,
    WORK_DIR: cfg.paths.workDir,
    TRANSCRIPTS_DIR: cfg.paths.transcriptsDir,
    SUMMARIES_DIR: cfg.paths.summariesDir,
    LOG_DIR: cfg.paths.logDir,
    SPLIT_CHUNK_SEC: cfg.split.chunkDurationMs / 1000,
    SPLIT_OVERLAP_SEC: cfg.split.overlapMs / 1000,
    SPLIT_FORMAT: cfg.split.format,
    KEEP_CHUNKS: cfg.split.keepChunks,
    FFMPEG_PATH: cfg.split.ffmpegPath,
    FFPROBE_PATH: cfg.split.ffprobePath,
    STT_PROVIDER: cfg.stt.provider,
    STT_OPENAI_MODEL: cfg.stt.model,
    STT_LANGUAGE: cfg.stt.language,
    STT_PROMPT: cfg.stt.prompt,
    STT_MAX_WORKERS: cfg.stt.maxWorkers,
    STT_MAX_RETRIES: cfg.stt.retry.maxRetries,
    STT_BACKOFF_BASE_MS: cfg.stt.retry.baseDelayMs,
    STT_BACKOFF_MAX_MS: cfg.stt.retry.maxDelayMs,
    ASSEMBLE_TRIM: cfg.assemble.trimEnabled,
    ASSEMBLE_TRIM_WINDOW_CHARS: cfg.assemble.windowChars,
    ASSEMBLE_TRIM_MIN_CHARS: cfg.assemble.minMatchChars,
    LLM_PROVIDER: cfg.llm.provider,
    LLM_MODEL: cfg.llm.model,
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    SUMMARY_TARGET_CHARS: cfg.summary.targetChars,
    SUMMARY_MAX_INPUT_CHARS: cfg.summary.maxInputChars,
    SUMMARY_REDUCE: cfg.summary.reducePartials,
    SUMMARY_MAX_WORKERS: cfg.summary.maxWorkers,
    SUMMARY_MAX_RETRIES: cfg.summary.retry.maxRetries,
    BACKOFF_JITTER: cfg.stt.retry.jitterRatio,
    PIPELINE_FILE_INTERVAL_MS: cfg.pipeline.fileIntervalMs,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  log.debug("Config snapshot", "boot", snap);
}
