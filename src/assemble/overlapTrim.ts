/**
 * Boundary de-duplication between consecutive fragments.
 *
 * Consecutive chunks share `overlap` seconds of audio, so the end of fragment i
 * and the start of fragment i+1 often repeat the same words. This is a
 * best-effort heuristic, not an exact alignment: both sides are compared after
 * folding case and dropping whitespace, punctuation and symbols, and the
 * longest suffix of the previous tail window that equals a prefix of the next
 * head window is cut from the next fragment, provided it is at least
 * `minMatchChars` long. Recognizers rarely produce identical text for the
 * shared audio, so a miss (no trim) is the common safe outcome.
 *
 * Character-based, so it behaves the same for space-delimited languages and
 * for scripts written without spaces.
 */

export type TrimOptions = {
  windowChars: number;
  minMatchChars: number;
};

export type TrimResult = {
  text: string;
  /** Normalized characters matched; 0 when nothing was trimmed. */
  matchedChars: number;
};

const IGNORED = /[\s\p{P}\p{S}]/u;

type NormalizedChar = {
  value: string;
  /** Position of the source code point in the input array. */
  at: number;
};

function normalize(codePoints: string[]): NormalizedChar[] {
  const out: NormalizedChar[] = [];
  codePoints.forEach((ch, at) => {
    if (!IGNORED.test(ch)) out.push({ value: ch.toLowerCase(), at });
  });
  return out;
}

function suffixEqualsPrefix(tail: NormalizedChar[], head: NormalizedChar[], length: number): boolean {
  const offset = tail.length - length;
  for (let i = 0; i < length; i++) {
    if (tail[offset + i]?.value !== head[i]?.value) return false;
  }
  return true;
}

export function trimOverlap(previous: string, next: string, options: TrimOptions): TrimResult {
  const window = Math.max(1, Math.floor(options.windowChars));
  const minMatch = Math.max(1, Math.floor(options.minMatchChars));

  const prevPoints = Array.from(previous);
  const nextPoints = Array.from(next);
  const tail = normalize(prevPoints.slice(Math.max(0, prevPoints.length - window)));
  const head = normalize(nextPoints.slice(0, window));

  for (let length = Math.min(tail.length, head.length); length >= minMatch; length--) {
    if (!suffixEqualsPrefix(tail, head, length)) continue;

    const last = head[length - 1];
    if (!last) break;
    const rest = nextPoints
      .slice(last.at + 1)
      .join("")
      .replace(/^[\s\p{P}\p{S}]+/u, "");
    return { text: rest, matchedChars: length };
  }

  return { text: next, matchedChars: 0 };
}
