import { performance } from 'node:perf_hooks';

export function monotonicNow(): number {
  return performance.now();
}

export function isoNow(): string {
  return new Date().toISOString();
}

/** `YYYYMMDD_HHMMSS` in UTC, used in memory file names and sources. */
export function compactTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
