/**
 * Centralized logging for the pipeline.
 *
 * Environment Variables:
 *   LOG_LEVEL=error|warn|info|debug|trace  (default: info)
 *   LOG_SCOPES=split,stt,pool,assemble,llm,summarize,pipeline,boot
 *      (optional, default: all scopes allowed)
 *   LOG_FORMAT=pretty|json  (default: pretty)
 *
 * Example Usage:
 *   LOG_LEVEL=debug LOG_SCOPES=pool,stt  npm run transcribe
 *   LOG_LEVEL=warn  npm run summarize  // Only warnings and errors
 *
 * A run can attach a file sink (attachFile) which receives every entry at
 * debug level or above as JSON lines, regardless of console filters.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogScope =
  | "boot"
  | "split"
  | "stt"
  | "pool"
  | "assemble"
  | "llm"
  | "summarize"
  | "pipeline"
  | string;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const FILE_LEVEL = LOG_LEVELS.debug;

function parseLevel(value: string | undefined): number {
  const key = (value ?? "info").toLowerCase();
  switch (key) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
      return LOG_LEVELS[key];
    default:
      return LOG_LEVELS.info;
  }
}

class Logger {
  private level: number;
  private scopes: Set<string>;
  private format: "pretty" | "json";
  private filePath: string | null = null;

  constructor() {
    this.level = parseLevel(process.env.LOG_LEVEL);

    // Parse LOG_SCOPES (default: all scopes allowed)
    this.scopes = new Set(
      (process.env.LOG_SCOPES ?? "")
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s)
    );

    this.format = process.env.LOG_FORMAT === "json" ? "json" : "pretty";
  }

  /**
   * Apply settings from a loaded Config (overrides what was read from env at import time).
   */
  configure(opts: { level: LogLevel; scopes?: string[]; format: "pretty" | "json" }): void {
    this.level = LOG_LEVELS[opts.level];
    this.scopes = new Set(opts.scopes ?? []);
    this.format = opts.format;
  }

  /**
   * Mirror entries into a JSON-lines file. Pass null to detach.
   */
  attachFile(filePath: string | null): void {
    if (filePath) {
      mkdirSync(dirname(filePath), { recursive: true });
    }
    this.filePath = filePath;
  }

  private shouldLog(level: LogLevel, scope?: string): boolean {
    // Check level
    if (LOG_LEVELS[level] < this.level) return false;

    // Check scope: if scopes are set, only log if scope matches
    if (this.scopes.size > 0 && scope && !this.scopes.has(scope)) {
      return false;
    }

    return true;
  }

  private formatOutput(entry: LogEntry): string {
    if (this.format === "json") {
      return JSON.stringify(entry);
    }

    const time = entry.timestamp.slice(11, 19); // HH:MM:SS
    const levelAbbr = {
      trace: "TRC",
      debug: "DBG",
      info: "INF",
      warn: "WRN",
      error: "ERR",
    }[entry.level];
    const scopeStr = entry.scope ? ` │ ${entry.scope}` : "";
    const dataStr = entry.data !== undefined ? ` │ ${JSON.stringify(entry.data)}` : "";

    return `${time} [${levelAbbr}]${scopeStr} ${entry.message}${dataStr}`;
  }

  private emit(entry: LogEntry): void {
    if (this.filePath && LOG_LEVELS[entry.level] >= FILE_LEVEL) {
      appendFileSync(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
    }

    if (!this.shouldLog(entry.level, entry.scope)) return;

    const output = this.formatOutput(entry);

    switch (entry.level) {
      case "error":
        console.error(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "info":
      case "debug":
        console.log(output);
        break;
      case "trace":
        console.debug(output);
        break;
    }
  }

  private write(level: LogLevel, message: string, scope?: LogScope, data?: unknown): void {
    this.emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
    });
  }

  trace(message: string, scope?: LogScope, data?: unknown): void {
    this.write("trace", message, scope, data);
  }

  debug(message: string, scope?: LogScope, data?: unknown): void {
    this.write("debug", message, scope, data);
  }

  info(message: string, scope?: LogScope, data?: unknown): void {
    this.write("info", message, scope, data);
  }

  warn(message: string, scope?: LogScope, data?: unknown): void {
    this.write("warn", message, scope, data);
  }

  error(message: string, scope?: LogScope, data?: unknown): void {
    this.write("error", message, scope, data);
  }

  /**
   * Create a scoped logger that automatically includes a scope in all messages.
   * Usage: const poolLog = log.withScope("pool");
   *        poolLog.debug("message") -> logs with scope="pool"
   */
  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

/**
 * A logger bound to a specific scope.
 */
export class ScopedLogger {
  constructor(
    private logger: Logger,
    private scope: LogScope
  ) {}

  trace(message: string, data?: unknown): void {
    this.logger.trace(message, this.scope, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.scope, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(message, this.scope, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.scope, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.scope, data);
  }
}

// Export singleton instance
export const log = new Logger();
export default log;
