export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export type SttProviderName = "openai" | "debug";
export type LlmProviderName = "openai" | "debug";

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number; // 0 disables jitter
}

export interface StageConcurrency {
  maxWorkers: number;
  retry: RetryPolicy;
}

export interface Config {
  openai: {
    apiKey?: string; // required unless every provider is "debug"
  };

  paths: {
    inputDir: string;
    workDir: string;
    transcriptsDir: string;
    summariesDir: string;
    logDir: string;
  };

  split: {
    chunkDurationMs: number;
    overlapMs: number;
    format: string;
    keepChunks: boolean;
    ffmpegPath: string;
    ffprobePath: string;
  };

  stt: StageConcurrency & {
    provider: SttProviderName;
    model: string;
    language?: string;
    prompt?: string;
  };

  assemble: {
    trimEnabled: boolean;
    windowChars: number;
    minMatchChars: number;
  };

  llm: {
    provider: LlmProviderName;
    model: string;
    temperature: number;
    maxTokens: number;
  };

  summary: StageConcurrency & {
    targetChars: number;
    maxInputChars: number;
    reducePartials: boolean;
  };

  pipeline: {
    fileIntervalMs: number;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
