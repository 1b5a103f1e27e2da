/** Exponential backoff: `base * 2^(attempt - 1)`, capped. Attempt 0 waits nothing. */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 30_000): number {
  if (attempt <= 0) return 0;
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}
