import { ConfigError } from "../errors.js";
import type { ChunkSpan } from "../pipeline/types.js";

export type SplitWindow = {
  chunkDurationMs: number;
  overlapMs: number;
};

export function validateSplitWindow(window: SplitWindow): void {
  const { chunkDurationMs, overlapMs } = window;
  if (!Number.isFinite(chunkDurationMs) || chunkDurationMs <= 0) {
    throw new ConfigError(`chunk duration must be positive, got ${chunkDurationMs}ms`);
  }
  if (!Number.isFinite(overlapMs) || overlapMs < 0 || overlapMs >= chunkDurationMs) {
    throw new ConfigError(
      `overlap must be in [0, chunk duration), got ${overlapMs}ms for ${chunkDurationMs}ms chunks`,
    );
  }
}

/**
 * Fixed-grid sliding window. Chunk i nominally covers
 * [i * chunk - overlap, (i + 1) * chunk), clamped to [0, duration], so every
 * chunk after the first re-reads `overlap` of its predecessor's audio and the
 * union covers the whole source.
 */
export function planChunks(sourceDurationMs: number, window: SplitWindow): ChunkSpan[] {
  validateSplitWindow(window);
  if (!Number.isFinite(sourceDurationMs) || sourceDurationMs <= 0) return [];

  const { chunkDurationMs, overlapMs } = window;
  const count = Math.ceil(sourceDurationMs / chunkDurationMs);
  const spans: ChunkSpan[] = [];

  for (let index = 0; index < count; index++) {
    const startMs = Math.max(0, index * chunkDurationMs - overlapMs);
    const endMs = Math.min((index + 1) * chunkDurationMs, sourceDurationMs);
    spans.push({
      index,
      startMs,
      endMs,
      overlapMs: index === 0 ? 0 : overlapMs,
    });
  }

  return spans;
}
