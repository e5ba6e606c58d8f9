import OpenAI from "openai";
import type { Config } from "../config/types.js";
import { requireOpenAiKey } from "../config/env.js";
import { RemoteError } from "../errors.js";
import { log } from "../utils/logger.js";
import { classifyOpenAiError } from "./openaiErrors.js";

const llmLog = log.withScope("llm");

export type LlmCallInput = {
  systemPrompt: string;
  userPrompt: string;
  model: string;
};

export type LlmCall = (input: LlmCallInput) => Promise<string>;

const clients = new Map<string, OpenAI>();

/**
 * One SDK client per API key. SDK-level retries are off: the worker pool owns
 * the retry budget.
 */
export function getOpenAIClient(apiKey: string): OpenAI {
  let client = clients.get(apiKey);
  if (!client) {
    client = new OpenAI({ apiKey, maxRetries: 0 });
    clients.set(apiKey, client);
  }
  return client;
}

export async function chat(
  client: OpenAI,
  opts: {
    systemPrompt: string;
    userMessage: string;
    model: string;
    temperature: number;
    maxTokens: number;
  },
): Promise<string> {
  let content: string | undefined;
  try {
    const response = await client.chat.completions.create({
      model: opts.model,
      temperature: opts.temperature,
      max_tokens: opts.maxTokens,
      messages: [
        { role: "system", content: opts.systemPrompt },
        { role: "user", content: opts.userMessage },
      ],
    });
    content = response.choices[0]?.message?.content?.trim();
  } catch (err) {
    const remote = classifyOpenAiError(err);
    llmLog.debug(`Chat completion failed: ${err instanceof Error ? err.message : String(err)}`, {
      kind: remote?.kind,
      status: remote?.status,
    });
    throw remote ?? err;
  }

  if (!content) {
    throw new RemoteError("invalid_input", "Empty response from OpenAI");
  }
  return content;
}

/**
 * Deterministic stand-in used with LLM_PROVIDER=debug: echoes the head of the
 * prompt so dry runs exercise the whole stage without network access.
 */
export const debugLlmCall: LlmCall = async (input) => {
  const preview = input.userPrompt.replace(/\s+/g, " ").trim().slice(0, 120);
  return `[debug summary by ${input.model}] ${preview}`;
};

export function createLlmCall(cfg: Config): LlmCall {
  if (cfg.llm.provider === "debug") {
    return debugLlmCall;
  }

  const client = getOpenAIClient(requireOpenAiKey(cfg));
  return (input) =>
    chat(client, {
      systemPrompt: input.systemPrompt,
      userMessage: input.userPrompt,
      model: input.model,
      temperature: cfg.llm.temperature,
      maxTokens: cfg.llm.maxTokens,
    });
}
