import { expect, test } from "vitest";
import { RemoteError } from "../../errors.js";
import type { LlmCallInput } from "../../llm/client.js";
import type { TextDocument } from "../../pipeline/types.js";
import { summarizeDocuments, type SummarizeOptions } from "../../summarize/summarizer.js";

function doc(documentId: string, text: string): TextDocument {
  return { documentId, path: `/transcripts/${documentId}.txt`, text };
}

function options(callLlm: SummarizeOptions["callLlm"], overrides: Partial<SummarizeOptions> = {}): SummarizeOptions {
  return {
    callLlm,
    model: "test-model",
    targetChars: 2000,
    maxInputChars: 1000,
    reducePartials: true,
    maxWorkers: 2,
    retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1, jitterRatio: 0 },
    sleep: async () => {},
    ...overrides,
  };
}

const threeLines = "alpha alpha alpha\nbeta beta beta\ngamma gamma gamma";

function pieceReply(input: LlmCallInput): string {
  if (input.userPrompt.includes("--- Part summaries ---")) return "merged article";
  if (input.userPrompt.includes("alpha")) return "A";
  if (input.userPrompt.includes("beta")) return "B";
  return "G";
}

test("a short document is summarized in one call", async () => {
  const calls: LlmCallInput[] = [];
  const [outcome] = await summarizeDocuments(
    [doc("talk", "A short transcript.")],
    options(async (input) => {
      calls.push(input);
      return "  Title\n\nBody  ";
    }),
  );

  expect(calls).toHaveLength(1);
  expect(calls[0]?.model).toBe("test-model");
  expect(outcome).toEqual({
    documentId: "talk",
    status: "ok",
    summary: { documentId: "talk", text: "Title\n\nBody", parts: 1, reduced: false },
  });
});

test("oversized document is split, summarized per piece and merged", async () => {
  const prompts: string[] = [];
  const [outcome] = await summarizeDocuments(
    [doc("long", threeLines)],
    options(
      async (input) => {
        prompts.push(input.userPrompt);
        return pieceReply(input);
      },
      { maxInputChars: 20 },
    ),
  );

  expect(prompts).toHaveLength(4);
  const merge = prompts.find((p) => p.includes("--- Part summaries ---"));
  expect(merge).toContain("### Part 1\nA\n\n### Part 2\nB\n\n### Part 3\nG");
  expect(outcome).toEqual({
    documentId: "long",
    status: "ok",
    summary: { documentId: "long", text: "merged article", parts: 3, reduced: true },
  });
});

test("without reduction partial summaries are concatenated in order", async () => {
  const prompts: string[] = [];
  const [outcome] = await summarizeDocuments(
    [doc("long", threeLines)],
    options(
      async (input) => {
        prompts.push(input.userPrompt);
        return pieceReply(input);
      },
      { maxInputChars: 20, reducePartials: false },
    ),
  );

  expect(prompts).toHaveLength(3);
  expect(prompts.every((p) => p.includes("about 667 characters"))).toBe(true);
  expect(outcome?.status === "ok" ? outcome.summary : null).toEqual({
    documentId: "long",
    text: "A\n\nB\n\nG",
    parts: 3,
    reduced: false,
  });
});

test("a failed document is skipped and the others complete", async () => {
  const outcomes = await summarizeDocuments(
    [doc("good", "Clear recording."), doc("bad", "bad audio"), doc("empty", "   ")],
    options(async (input) => {
      if (input.userPrompt.includes("bad audio")) throw new RemoteError("auth_error", "invalid key", { status: 401 });
      return "fine";
    }),
  );

  expect(outcomes.map((o) => o.documentId)).toEqual(["good", "bad", "empty"]);
  expect(outcomes[0]?.status).toBe("ok");
  expect(outcomes[1]).toEqual({ documentId: "bad", status: "failed", reason: "auth_error: invalid key" });
  expect(outcomes[2]).toEqual({ documentId: "empty", status: "failed", reason: "empty transcript" });
});

test("rate-limited calls are retried", async () => {
  let calls = 0;
  const [outcome] = await summarizeDocuments(
    [doc("talk", "Some transcript.")],
    options(async () => {
      calls += 1;
      if (calls === 1) throw new RemoteError("rate_limited", "slow down", { status: 429 });
      return "second try";
    }),
  );

  expect(calls).toBe(2);
  expect(outcome?.status === "ok" ? outcome.summary.text : null).toBe("second try");
});

test("a repeated document id fails instead of sharing the first document's summary", async () => {
  const prompts: string[] = [];
  const outcomes = await summarizeDocuments(
    [doc("lecture", "Spoken in March."), doc("lecture", "Spoken in May.")],
    options(async (input) => {
      prompts.push(input.userPrompt);
      return "summary";
    }),
  );

  expect(prompts).toHaveLength(1);
  expect(prompts[0]).toContain("Spoken in March.");
  expect(outcomes[0]?.status).toBe("ok");
  expect(outcomes[1]).toEqual({ documentId: "lecture", status: "failed", reason: 'duplicate document id "lecture"' });
});
