import path from "node:path";

/**
 * File naming contract between the stages. Chunk and fragment names encode the
 * source identity and the zero-padded sequence index so the assembler can group
 * and order them from a directory listing alone.
 */

export const INDEX_WIDTH = 3;

export function padIndex(index: number): string {
  return String(index).padStart(INDEX_WIDTH, "0");
}

export function sourceIdOf(filePath: string): string {
  return path.parse(filePath).name;
}

export function chunkFilename(sourceId: string, index: number, format: string): string {
  return `${sourceId}_${padIndex(index)}.${format}`;
}

export function fragmentFilename(sourceId: string, index: number): string {
  return `${sourceId}_${padIndex(index)}.txt`;
}

export function transcriptFilename(sourceId: string): string {
  return `${sourceId}.txt`;
}

export function summaryFilename(documentId: string): string {
  return `summary_${documentId}.txt`;
}

const FRAGMENT_PATTERN = /^(.+)_(\d{3,})\.txt$/;

/**
 * Inverse of fragmentFilename. Returns null for names outside the contract.
 */
export function parseFragmentFilename(fileName: string): { sourceId: string; index: number } | null {
  const match = FRAGMENT_PATTERN.exec(fileName);
  if (!match) return null;
  const [, sourceId, digits] = match;
  if (sourceId === undefined || digits === undefined) return null;
  return { sourceId, index: Number.parseInt(digits, 10) };
}

/**
 * Tracks which file owns each source id within one run. Two inputs that
 * differ only by extension (lecture.mp3, lecture.wav) would otherwise write
 * the same chunk, fragment and transcript files.
 */
export class SourceIdClaims {
  private readonly owners = new Map<string, string>();

  /** Returns null when the id is now owned by `fileName`, otherwise why it cannot be. */
  claim(sourceId: string, fileName: string): string | null {
    const owner = this.owners.get(sourceId);
    if (owner !== undefined) {
      return `duplicate source id "${sourceId}", already used by ${owner}`;
    }
    this.owners.set(sourceId, fileName);
    return null;
  }
}
