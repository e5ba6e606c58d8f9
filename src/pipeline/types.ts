export type SourceFile = {
  /** Stable identity: the file name without extension, used in every derived file name. */
  sourceId: string;
  path: string;
  fileName: string;
  format: string;
  sizeBytes: number;
};

export type ChunkSpan = {
  index: number;
  startMs: number;
  endMs: number;
  /** Audio shared with the previous chunk (0 for the first chunk). */
  overlapMs: number;
};

export type Chunk = ChunkSpan & {
  sourceId: string;
  path: string;
  format: string;
};

export type TranscriptFragment =
  | { sourceId: string; index: number; status: "ok"; text: string; attempts: number }
  | { sourceId: string; index: number; status: "failed"; error: string; attempts: number };

export type AssembledTranscript = {
  sourceId: string;
  text: string;
  chunkCount: number;
  gaps: number[];
  trimmedJoins: number;
};

export type TextDocument = {
  /** Transcript name without extension. */
  documentId: string;
  path: string;
  text: string;
};

export type Summary = {
  documentId: string;
  text: string;
  parts: number;
  reduced: boolean;
};

export type FileStatus = "success" | "partial" | "failed";

export type FileOutcome = {
  file: string;
  status: FileStatus;
  chunks?: number;
  gaps: number[];
  reason?: string;
  outputPath?: string;
};

export type StageName = "transcribe" | "summarize" | "assemble";

export type RunReport = {
  stage: StageName;
  startedAt: string;
  finishedAt: string;
  cancelled: boolean;
  files: FileOutcome[];
};
