import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";

export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = exp * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(exp + jitter));
}

/**
 * Runs `operation` until it resolves, the policy refuses to retry the error,
 * or `maxAttempts` runs have failed.  The last error is rethrown as is.
 */
export async function withRetry<T>(
  operation: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  sleeper: Sleeper
): Promise<T> {
  if (policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${policy.maxAttempts}`);
  }

  const startedAt = Date.now();
  let lastError: unknown;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation({ attempt, startedAt, lastError });
    } catch (err) {
      lastError = err;
      if (attempt >= policy.maxAttempts || !policy.shouldRetry(err)) throw err;

      const delay = computeBackoffDelay(policy, attempt);
      if (delay > 0) await sleeper(delay);
    }
  }
}
