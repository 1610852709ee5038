/** Delays between entity creation attempts. */
export interface RetryPolicy {
  /** Wait after the first failure; no delay is shorter. */
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Fraction of the delay added or removed at random. */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialDelayMs: 500,
  multiplier: 2,
  maxDelayMs: 5_000,
  jitter: 0.2,
};

export function retryDelayMs(failedAttempts: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exponent = Math.max(0, Math.floor(failedAttempts) - 1);
  const nominal = Math.min(policy.initialDelayMs * Math.pow(policy.multiplier, exponent), policy.maxDelayMs);
  const spread = policy.jitter > 0 ? nominal * policy.jitter * (random() * 2 - 1) : 0;
  return Math.round(Math.min(Math.max(nominal + spread, policy.initialDelayMs), policy.maxDelayMs));
}
