/** Convert epoch milliseconds to whole epoch seconds (JWT NumericDate). */
export function toEpochSeconds(ms: number): number {
  return Math.floor(ms / 1000);
}

/** Parse an ISO-8601 timestamp into epoch milliseconds. */
export function parseTimestamp(s: string): number {
  const ms = Date.parse(s);
  if (isNaN(ms)) {
    throw new Error(`Invalid timestamp: ${s}`);
  }
  return ms;
}

/** Format epoch milliseconds for log lines; infinite expiries print as "never". */
export function formatTimestamp(ms: number): string {
  return Number.isFinite(ms) ? new Date(ms).toISOString() : "never";
}

/** True when `expiresAt` is still more than `marginMs` away from `now`. */
export function isFresh(expiresAt: number, now: number, marginMs: number): boolean {
  return expiresAt > now + marginMs;
}
