/**
 * Error taxonomy shared by every stage.
 *
 *   ConfigError        fatal at startup, nothing is processed
 *   SplitError         fatal for one source file, siblings continue
 *   RemoteError        one failed remote call (retryable or not)
 *   TerminalTaskError  a pool task that ran out of attempts
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class SplitError extends Error {
  constructor(
    message: string,
    readonly sourcePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SplitError";
  }
}

export type RemoteErrorKind = "rate_limited" | "server_error" | "auth_error" | "invalid_input";

const RETRYABLE_KINDS: ReadonlySet<RemoteErrorKind> = new Set(["rate_limited", "server_error"]);

export class RemoteError extends Error {
  readonly retryable: boolean;
  readonly status: number | undefined;

  constructor(
    readonly kind: RemoteErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = "RemoteError";
    this.retryable = RETRYABLE_KINDS.has(kind);
    this.status = options?.status;
  }
}

export class TerminalTaskError extends Error {
  constructor(
    readonly index: number,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Task ${index} failed after ${attempts} attempt(s): ${describeError(lastError)}`, {
      cause: lastError,
    });
    this.name = "TerminalTaskError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof RemoteError) return `${err.kind}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}

/** `Name: message`, as shown in the run report for a failed file. */
export function failureReason(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
