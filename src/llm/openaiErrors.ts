import { APIConnectionError } from "openai";
import { RemoteError } from "../errors.js";

const TRANSIENT_NETWORK_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN", "EPIPE"]);

function readProperty(err: unknown, key: "status" | "code"): unknown {
  if (typeof err === "object" && err !== null && key in err) {
    return Reflect.get(err, key);
  }
  return undefined;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map an OpenAI SDK (or socket) failure onto the remote error taxonomy.
 * 429 / 408 / 409 / 5xx / connection faults are retryable; 401 / 403 are auth
 * errors; any other 4xx is invalid input. Returns undefined for errors that
 * did not come from the remote call (programming errors keep their identity).
 */
export function classifyOpenAiError(err: unknown): RemoteError | undefined {
  if (err instanceof RemoteError) return err;

  const message = messageOf(err);

  if (err instanceof APIConnectionError) {
    return new RemoteError("server_error", message, { cause: err });
  }

  const status = readProperty(err, "status");
  if (typeof status === "number") {
    if (status === 429) return new RemoteError("rate_limited", message, { cause: err, status });
    if (status === 408 || status === 409 || status >= 500) {
      return new RemoteError("server_error", message, { cause: err, status });
    }
    if (status === 401 || status === 403) return new RemoteError("auth_error", message, { cause: err, status });
    if (status >= 400) return new RemoteError("invalid_input", message, { cause: err, status });
  }

  const code = readProperty(err, "code");
  if (typeof code === "string" && TRANSIENT_NETWORK_CODES.has(code)) {
    return new RemoteError("server_error", message, { cause: err });
  }

  return undefined;
}
