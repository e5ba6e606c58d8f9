import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { padIndex, parseFragmentFilename } from "../pipeline/naming.js";
import type { AssembledTranscript, TranscriptFragment } from "../pipeline/types.js";
import { log } from "../utils/logger.js";
import { trimOverlap, type TrimOptions } from "./overlapTrim.js";

const assembleLog = log.withScope("assemble");

export type AssembleOptions = TrimOptions & {
  trimEnabled: boolean;
};

export type AssembleInput = {
  sourceId: string;
  /** Number of chunks the source was split into; indices below it with no fragment are gaps. */
  chunkCount: number;
  fragments: TranscriptFragment[];
  options: AssembleOptions;
};

export function gapMarker(index: number): string {
  return `[[transcription gap: chunk ${padIndex(index)}]]`;
}

const GAP_MARKER_PATTERN = /\[\[transcription gap: chunk (\d+)\]\]/g;

/** Chunk indices of the gap markers present in an assembled transcript, ascending. */
export function findGapMarkers(text: string): number[] {
  const indices = [...text.matchAll(GAP_MARKER_PATTERN)].map((match) => Number.parseInt(match[1] ?? "", 10));
  return [...new Set(indices.filter(Number.isFinite))].sort((a, b) => a - b);
}

/**
 * Join fragments in ascending index order, whatever order they arrive in.
 * Failed or missing fragments become a visible gap marker; boundary trimming
 * only runs between two successfully transcribed neighbours.
 */
export function assembleTranscript(input: AssembleInput): AssembledTranscript {
  const byIndex = new Map<number, TranscriptFragment>();
  for (const fragment of [...input.fragments].sort((a, b) => a.index - b.index)) {
    if (!byIndex.has(fragment.index)) byIndex.set(fragment.index, fragment);
  }

  const maxIndex = Math.max(-1, ...byIndex.keys());
  const chunkCount = Math.max(input.chunkCount, maxIndex + 1);

  const parts: string[] = [];
  const gaps: number[] = [];
  let trimmedJoins = 0;
  let previousText: string | null = null;

  for (let index = 0; index < chunkCount; index++) {
    const fragment = byIndex.get(index);

    if (!fragment || fragment.status === "failed") {
      parts.push(gapMarker(index));
      gaps.push(index);
      previousText = null;
      continue;
    }

    let text = fragment.text.trim();
    if (input.options.trimEnabled && previousText) {
      const trimmed = trimOverlap(previousText, text, input.options);
      if (trimmed.matchedChars > 0) {
        trimmedJoins += 1;
        assembleLog.debug(`${input.sourceId}#${padIndex(index)}: trimmed ${trimmed.matchedChars} overlapping char(s)`);
      }
      text = trimmed.text;
    }

    if (text) parts.push(text);
    previousText = fragment.text.trim();
  }

  if (gaps.length > 0) {
    assembleLog.warn(`${input.sourceId}: ${gaps.length} gap(s) at index ${gaps.join(", ")}`);
  }

  return {
    sourceId: input.sourceId,
    text: parts.join("\n"),
    chunkCount,
    gaps,
    trimmedJoins,
  };
}

/**
 * Rebuild fragments for one source from {sourcename}_{index}.txt files left in
 * the working directory.
 */
export async function readFragmentsFromDirectory(dir: string, sourceId: string): Promise<TranscriptFragment[]> {
  const entries = await readdir(dir);
  const fragments: TranscriptFragment[] = [];

  for (const name of entries.sort()) {
    const parsed = parseFragmentFilename(name);
    if (!parsed || parsed.sourceId !== sourceId) continue;
    const text = await readFile(path.join(dir, name), "utf-8");
    fragments.push({ sourceId, index: parsed.index, status: "ok", text, attempts: 0 });
  }

  return fragments;
}

/**
 * Source ids that have at least one fragment file in `dir`, sorted.
 */
export async function listFragmentSources(dir: string): Promise<string[]> {
  const entries = await readdir(dir);
  const ids = new Set<string>();
  for (const name of entries) {
    const parsed = parseFragmentFilename(name);
    if (parsed) ids.add(parsed.sourceId);
  }
  return [...ids].sort();
}
