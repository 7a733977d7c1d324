/**
 * Exponential backoff with jitter
 */

export interface BackoffPolicy {
  /** Delay before the first retry */
  baseMs: number;
  /** Cap on the exponential part */
  maxMs: number;
  /** Fraction of the capped delay added as random jitter (0..1) */
  jitter: number;
}

/**
 * Delay before retry number `attempt` (1-based): the base doubles per
 * attempt up to the cap, then up to `jitter` of that is added at random.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const exponent = Math.max(attempt, 1) - 1;
  const backoff = Math.min(policy.baseMs * Math.pow(2, exponent), policy.maxMs);
  const jitter = backoff * policy.jitter * random();
  return Math.round(backoff + jitter);
}
