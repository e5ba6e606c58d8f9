import { DateTime, Duration } from "luxon";

/**
 * Media offset as a clock string: "19:40" below an hour, "1:05:00" above.
 * Rounded to whole seconds.
 */
export function formatOffset(ms: number): string {
  const whole = Duration.fromMillis(Math.max(0, Math.round(ms / 1000)) * 1000);
  return whole.toFormat(ms >= 3_600_000 ? "h:mm:ss" : "mm:ss");
}

export function formatSpan(startMs: number, endMs: number): string {
  return `${formatOffset(startMs)}–${formatOffset(endMs)}`;
}

/**
 * Filesystem-safe local timestamp used to name per-run artifacts (logs, reports).
 */
export function runStamp(now: Date = new Date()): string {
  return DateTime.fromJSDate(now).toFormat("yyyyLLdd-HHmmss");
}
