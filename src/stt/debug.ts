import type { SttProvider, TranscriptionRequest } from "./provider.js";

/**
 * Debug STT Provider
 *
 * Returns deterministic text per chunk so the split → transcribe → assemble
 * path can be exercised without an API key.
 */
export class DebugSttProvider implements SttProvider {
  async transcribe(request: TranscriptionRequest): Promise<string> {
    const kib = (request.audio.length / 1024).toFixed(1);
    return `(debug transcript of ${request.filename}, ${kib} KiB ${request.format})`;
  }
}
