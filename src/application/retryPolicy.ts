export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

/** Delay before the next try after `attempt` consecutive retryable failures (1-based). */
export function backoffDelayMs(attempt: number, policy: RetryPolicy, random: () => number = Math.random) {
  const exponent = Math.max(0, attempt - 1);
  const base = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return base + jitter;
}

export function isExhausted(attempt: number, policy: RetryPolicy) {
  return attempt >= policy.maxAttempts;
}
