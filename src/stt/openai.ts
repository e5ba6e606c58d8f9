/**
 * OpenAI Whisper STT Provider
 *
 * Sends one chunk file to the Audio → transcriptions endpoint. Reuses the
 * OpenAI client cache from llm/client.ts. Retries are not done here: errors are
 * classified and left to the worker pool.
 */

import type OpenAI from "openai";
import { toFile } from "openai/uploads";
import { requireOpenAiKey } from "../config/env.js";
import type { Config } from "../config/types.js";
import { getOpenAIClient } from "../llm/client.js";
import { classifyOpenAiError } from "../llm/openaiErrors.js";
import { log } from "../utils/logger.js";
import type { SttProvider, TranscriptionRequest } from "./provider.js";

const sttLog = log.withScope("stt");

const MIME_TYPES: Record<string, string> = {
  mp3: "audio/mpeg",
  m4a: "audio/mp4",
  wav: "audio/wav",
};

export type OpenAiSttOptions = {
  model: string;
  language?: string;
  prompt?: string;
};

export class OpenAiSttProvider implements SttProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAiSttOptions,
  ) {
    sttLog.debug(
      `OpenAI provider initialized: model=${options.model}${options.language ? `, language=${options.language}` : ""}${options.prompt ? ", prompt enabled" : ""}`,
    );
  }

  static fromConfig(cfg: Config): OpenAiSttProvider {
    return new OpenAiSttProvider(getOpenAIClient(requireOpenAiKey(cfg)), {
      model: cfg.stt.model,
      language: cfg.stt.language,
      prompt: cfg.stt.prompt,
    });
  }

  async transcribe(request: TranscriptionRequest): Promise<string> {
    try {
      // Wrap the buffer as a File object for the multipart upload
      const file = await toFile(request.audio, request.filename, {
        type: MIME_TYPES[request.format] ?? "application/octet-stream",
      });

      const response = await this.client.audio.transcriptions.create({
        file,
        model: this.options.model,
        // Language + vocabulary hints are optional
        ...(this.options.language ? { language: this.options.language } : {}),
        ...(this.options.prompt ? { prompt: this.options.prompt } : {}),
      });
      // Silent chunks legitimately come back empty
      return response.text.trim();
    } catch (err) {
      const remote = classifyOpenAiError(err);
      sttLog.debug(`Transcription of ${request.filename} failed: ${err instanceof Error ? err.message : String(err)}`, {
        kind: remote?.kind,
        status: remote?.status,
      });
      throw remote ?? err;
    }
  }
}
