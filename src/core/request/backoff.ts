/**
 * Bounded exponential backoff with jitter.
 *
 * delay(n) = min(MAX_DELAY_MS, BASE_DELAY_MS * 2^(n-1)) + jitter in [0, JITTER_MS)
 * raised to Retry-After (capped at MAX_RETRY_AFTER_MS) when the server sends one,
 * and never lower than the previous delay of the same run.
 */

/** Total attempts per request, first attempt included. */
export const MAX_ATTEMPTS = 4;
export const BASE_DELAY_MS = 500;
export const MAX_DELAY_MS = 8_000;
export const JITTER_MS = 250;
export const MAX_RETRY_AFTER_MS = 30_000;

/**
 * Delay before retry number `retry` (1 = first retry).
 *
 * @param random - Source of jitter in [0, 1)
 * @param retryAfterMs - Server-requested delay, if any
 * @param previousDelayMs - Delay used before the previous retry of this run
 */
export function computeDelay(
  retry: number,
  random: () => number = Math.random,
  retryAfterMs?: number,
  previousDelayMs = 0,
): number {
  const exponential = Math.min(MAX_DELAY_MS, BASE_DELAY_MS * 2 ** Math.max(0, retry - 1));
  const jitter = Math.floor(random() * JITTER_MS);
  let delay = exponential + jitter;
  if (retryAfterMs !== undefined) {
    delay = Math.max(delay, Math.min(retryAfterMs, MAX_RETRY_AFTER_MS));
  }
  return Math.max(delay, previousDelayMs);
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value?: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? diff : undefined;
  }
  return undefined;
}
