import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { sourceIdOf } from "./naming.js";
import type { SourceFile } from "./types.js";

export const AUDIO_EXTENSIONS = [".mp3", ".m4a", ".wav"] as const;
export const TRANSCRIPT_EXTENSIONS = [".txt"] as const;

/**
 * Regular files in `dir` whose extension (case-insensitive) is listed, sorted
 * by name so runs are reproducible. A missing directory yields an empty list.
 */
export async function discoverFiles(dir: string, extensions: readonly string[]): Promise<SourceFile[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const files: SourceFile[] = [];

  for (const fileName of entries.sort()) {
    const ext = path.extname(fileName).toLowerCase();
    if (!wanted.has(ext)) continue;

    const filePath = path.join(dir, fileName);
    const info = await stat(filePath);
    if (!info.isFile()) continue;

    files.push({
      sourceId: sourceIdOf(fileName),
      path: filePath,
      fileName,
      format: ext.slice(1),
      sizeBytes: info.size,
    });
  }

  return files;
}

/**
 * SourceFile for an explicitly named file (CLI --file). Throws if it is not a regular file.
 */
export async function sourceFromPath(filePath: string): Promise<SourceFile> {
  const info = await stat(filePath);
  if (!info.isFile()) {
    throw new Error(`Not a file: ${filePath}`);
  }
  const fileName = path.basename(filePath);
  return {
    sourceId: sourceIdOf(fileName),
    path: filePath,
    fileName,
    format: path.extname(fileName).slice(1).toLowerCase(),
    sizeBytes: info.size,
  };
}

export function discoverSources(dir: string): Promise<SourceFile[]> {
  return discoverFiles(dir, AUDIO_EXTENSIONS);
}

export function discoverTranscripts(dir: string): Promise<SourceFile[]> {
  return discoverFiles(dir, TRANSCRIPT_EXTENSIONS);
}
