/** Largest delay a Node.js timer can wait. */
export const MAX_DELAY_MS = 2_147_483_647;

/**
 * Parses a `Retry-After` value (delta-seconds or HTTP date) into milliseconds,
 * capped at {@link MAX_DELAY_MS}.
 * Returns undefined for missing, malformed, non-finite, negative, or past values.
 */
export const parseRetryAfter = (value?: string | null, now: number = Date.now()): number | undefined => {
  if (!value || !value.trim()) return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Number.isFinite(seconds) && seconds >= 0 ? Math.min(seconds * 1000, MAX_DELAY_MS) : undefined;
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? Math.min(diff, MAX_DELAY_MS) : undefined;
  }
  return undefined;
};
