import { describeError } from "../errors.js";
import type { LlmCall } from "../llm/client.js";
import type { Summary, TextDocument } from "../pipeline/types.js";
import { logTransitions } from "../pool/logTransitions.js";
import type { PoolOptions, PoolResult } from "../pool/types.js";
import { runPool } from "../pool/workerPool.js";
import { log } from "../utils/logger.js";
import { buildReducePrompt, buildSummaryPrompt, type PromptBundle } from "./prompts.js";
import { charCount, splitForSummary } from "./textChunker.js";

const summarizeLog = log.withScope("summarize");

export type SummarizeOptions = Omit<PoolOptions<string>, "onTransition"> & {
  callLlm: LlmCall;
  model: string;
  targetChars: number;
  maxInputChars: number;
  reducePartials: boolean;
};

export type SummaryOutcome =
  | { documentId: string; status: "ok"; summary: Summary }
  | { documentId: string; status: "failed"; reason: string };

type PromptTask = {
  /** Position of the document in the input list. */
  position: number;
  label: string;
  prompt: PromptBundle;
};

function firstFailure(result: PoolResult<string>, indices: number[]): string | null {
  for (const index of indices) {
    const outcome = result.outcomes.get(index);
    if (!outcome) return "cancelled before summarization";
    if (outcome.status === "failed") return describeError(outcome.error.lastError);
  }
  return null;
}

/**
 * Summarize documents through one bounded pool.
 *
 * Oversized documents are cut into non-overlapping pieces of at most
 * maxInputChars; every piece of every document is a task of the same pool run,
 * so maxWorkers bounds all in-flight calls. Piece summaries are put back in
 * piece order and, when reducePartials is set, merged by a second pool run.
 * A document with any failed piece is reported as failed; others proceed.
 * Outcomes come back in input order; a repeated documentId fails.
 */
export async function summarizeDocuments(
  documents: TextDocument[],
  options: SummarizeOptions,
): Promise<SummaryOutcome[]> {
  const { callLlm, model, targetChars, maxInputChars, reducePartials, ...poolOptions } = options;

  const runPrompts = (tasks: PromptTask[]) =>
    runPool(
      tasks.map((task, index) => ({ index, payload: task })),
      (task) => callLlm({ systemPrompt: task.prompt.systemPrompt, userPrompt: task.prompt.userPrompt, model }),
      {
        ...poolOptions,
        onTransition: logTransitions(summarizeLog, (index) => tasks[index]?.label ?? `task ${index}`),
      },
    );

  const outcomes = new Map<number, SummaryOutcome>();
  const fail = (position: number, documentId: string, reason: string) => {
    outcomes.set(position, { documentId, status: "failed", reason });
  };
  const succeed = (position: number, summary: Summary) => {
    outcomes.set(position, { documentId: summary.documentId, status: "ok", summary });
  };

  // Pass 1: one task per document piece.
  const pieceTasks: PromptTask[] = [];
  const taskIndicesByDoc = new Map<number, number[]>();
  const seenIds = new Set<string>();

  for (const [position, doc] of documents.entries()) {
    if (seenIds.has(doc.documentId)) {
      fail(position, doc.documentId, `duplicate document id "${doc.documentId}"`);
      continue;
    }
    seenIds.add(doc.documentId);

    const pieces = splitForSummary(doc.text, maxInputChars);
    if (pieces.length === 0) {
      fail(position, doc.documentId, "empty transcript");
      continue;
    }

    const pieceTarget = pieces.length > 1 && !reducePartials ? Math.ceil(targetChars / pieces.length) : targetChars;
    const indices: number[] = [];
    for (const piece of pieces) {
      indices.push(pieceTasks.length);
      pieceTasks.push({
        position,
        label: pieces.length > 1 ? `${doc.documentId} part ${piece.index + 1}/${pieces.length}` : doc.documentId,
        prompt: buildSummaryPrompt({
          transcript: piece.text,
          targetChars: pieceTarget,
          part: pieces.length > 1 ? { index: piece.index, total: pieces.length } : undefined,
        }),
      });
    }
    taskIndicesByDoc.set(position, indices);
    summarizeLog.info(`${doc.documentId}: ${charCount(doc.text)} chars → ${pieces.length} piece(s)`);
  }

  const pieceResult = await runPrompts(pieceTasks);

  // Reassemble piece summaries per document in piece order.
  const partialsByDoc = new Map<number, string[]>();
  for (const [position, indices] of taskIndicesByDoc) {
    const documentId = documents[position]?.documentId ?? `document ${position}`;
    const failure = firstFailure(pieceResult, indices);
    if (failure) {
      fail(position, documentId, failure);
      continue;
    }
    const partials = indices.map((index) => {
      const outcome = pieceResult.outcomes.get(index);
      return outcome?.status === "succeeded" ? outcome.value.trim() : "";
    });
    partialsByDoc.set(position, partials);
  }

  // Pass 2: merge multi-piece documents.
  const reduceTasks: PromptTask[] = [];
  for (const [position, partials] of partialsByDoc) {
    const documentId = documents[position]?.documentId ?? `document ${position}`;
    if (partials.length === 1) {
      succeed(position, { documentId, text: partials[0] ?? "", parts: 1, reduced: false });
      continue;
    }

    const concatenated = partials.join("\n\n");
    if (!reducePartials || charCount(concatenated) > maxInputChars) {
      if (reducePartials) {
        summarizeLog.warn(`${documentId}: partial summaries exceed ${maxInputChars} chars, concatenating instead of merging`);
      }
      succeed(position, { documentId, text: concatenated, parts: partials.length, reduced: false });
      continue;
    }

    reduceTasks.push({
      position,
      label: `${documentId} merge`,
      prompt: buildReducePrompt({ partials, targetChars }),
    });
  }

  if (reduceTasks.length > 0) {
    const reduceResult = await runPrompts(reduceTasks);
    reduceTasks.forEach((task, index) => {
      const documentId = documents[task.position]?.documentId ?? `document ${task.position}`;
      const outcome = reduceResult.outcomes.get(index);
      if (outcome?.status === "succeeded") {
        succeed(task.position, {
          documentId,
          text: outcome.value.trim(),
          parts: partialsByDoc.get(task.position)?.length ?? 0,
          reduced: true,
        });
      } else {
        fail(task.position, documentId, outcome ? describeError(outcome.error.lastError) : "cancelled before merge");
      }
    });
  }

  return documents.map(
    (doc, position) =>
      outcomes.get(position) ?? { documentId: doc.documentId, status: "failed", reason: "not summarized" },
  );
}
