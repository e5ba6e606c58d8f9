export type TextChunk = {
  index: number;
  text: string;
};

const SENTENCE = /[^.!?。！？]+[.!?。！？]*\s*|[.!?。！？]+\s*/gu;

/** Length in code points, so a surrogate pair counts once. */
export function charCount(text: string): number {
  return Array.from(text).length;
}

function sentencesOf(unit: string): string[] {
  return unit.match(SENTENCE) ?? [unit];
}

function hardSlices(unit: string, limit: number): string[] {
  const points = Array.from(unit);
  const slices: string[] = [];
  for (let start = 0; start < points.length; start += limit) {
    slices.push(points.slice(start, start + limit).join(""));
  }
  return slices;
}

/**
 * Split text into non-overlapping pieces of at most maxChars code points,
 * breaking at line boundaries first, then sentence ends (Latin and CJK), and
 * only as a last resort mid-sentence. Pieces are trimmed; concatenating them
 * in index order gives back the text up to whitespace at the cut points.
 */
export function splitForSummary(text: string, maxChars: number): TextChunk[] {
  const limit = Math.max(1, Math.floor(maxChars));
  const trimmed = text.trim();
  if (!trimmed) return [];
  if (charCount(trimmed) <= limit) return [{ index: 0, text: trimmed }];

  const pieces: string[] = [];
  let current = "";

  const flush = () => {
    const piece = current.trim();
    if (piece) pieces.push(piece);
    current = "";
  };

  const add = (unit: string, separator: string): boolean => {
    const candidate = current ? current + separator + unit : unit;
    if (charCount(candidate) <= limit) {
      current = candidate;
      return true;
    }
    return false;
  };

  for (const line of trimmed.split(/\n+/)) {
    if (!line.trim()) continue;
    if (add(line, "\n")) continue;

    flush();
    if (add(line, "\n")) continue;

    // Line alone is too long: fall back to sentences, then hard slices.
    for (const sentence of sentencesOf(line)) {
      if (add(sentence, "")) continue;
      flush();
      if (add(sentence, "")) continue;
      for (const slice of hardSlices(sentence, limit)) {
        flush();
        current = slice;
      }
    }
  }
  flush();

  return pieces.map((piece, index) => ({ index, text: piece }));
}
