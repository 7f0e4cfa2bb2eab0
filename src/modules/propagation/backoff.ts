/** Exponential delay for the n-th consecutive failure (1-based), capped at `maxMs`. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  // 2 ** 31 already dwarfs any sane cap; avoid Infinity on long outages.
  return Math.min(maxMs, baseMs * 2 ** Math.min(exponent, 31));
}
