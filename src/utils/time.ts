/**
 * Clock helpers: microsecond wall-clock timestamps and monotonic elapsed time
 */

import { performance } from "node:perf_hooks";

/**
 * Current wall-clock time in microseconds since the Unix epoch.
 * Milliseconds follow the system clock; only the sub-millisecond digits
 * come from the high-resolution timer.
 */
export function epochMicros(): number {
  const subMs = Math.floor((performance.now() % 1) * 1000);
  return Date.now() * 1000 + subMs;
}

/** Monotonic milliseconds, for latency measurement only */
export function monotonicMs(): number {
  return performance.now();
}

/** Format epoch microseconds as ISO-8601 UTC, e.g. 2024-05-01T12:00:00.123456Z */
export function formatTimestamp(micros: number): string {
  const ms = Math.floor(micros / 1000);
  const subMs = micros - ms * 1000;
  const iso = new Date(ms).toISOString();
  return `${iso.slice(0, -1)}${String(subMs).padStart(3, "0")}Z`;
}

/** Whole milliseconds elapsed since a monotonicMs() reading, never negative */
export function elapsedMs(startedAt: number, now: number = monotonicMs()): number {
  return Math.max(0, Math.floor(now - startedAt));
}
