/**
 * STT Provider Interface
 *
 * Pluggable speech-to-text backend. The transcription pool only sees this
 * interface; failures must be thrown as RemoteError so the pool can tell
 * retryable faults from terminal ones.
 */

import type { Config } from "../config/types.js";

export type TranscriptionRequest = {
  audio: Buffer;
  /** File name sent with the upload; its extension is the format hint. */
  filename: string;
  format: string;
};

export interface SttProvider {
  transcribe(request: TranscriptionRequest): Promise<string>;
}

/**
 * Get provider info for user-facing messages.
 */
export function getSttProviderInfo(cfg: Config): { name: string; description: string } {
  switch (cfg.stt.provider) {
    case "debug":
      return { name: "debug", description: "emits placeholder transcripts, no network" };
    case "openai":
      return {
        name: "openai",
        description: `real transcripts via OpenAI Audio API (${cfg.stt.model})`,
      };
  }
}

/**
 * Build the configured STT provider. The OpenAI SDK is only imported when used.
 */
export async function createSttProvider(cfg: Config): Promise<SttProvider> {
  switch (cfg.stt.provider) {
    case "debug": {
      const { DebugSttProvider } = await import("./debug.js");
      return new DebugSttProvider();
    }
    case "openai": {
      const { OpenAiSttProvider } = await import("./openai.js");
      return OpenAiSttProvider.fromConfig(cfg);
    }
  }
}
