/**
 * Delay before the next attempt after the `retryCount`-th failure:
 * base, 2·base, 4·base, ... capped at `maxMs`.
 */
export function computeBackoffMs(retryCount: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, retryCount - 1);
  return Math.min(baseMs * 2 ** exponent, maxMs);
}
