/**
 * Bounded polling and retry primitives.
 *
 * Both take an injectable `sleep` so tests can drive them without real delays.
 */

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface PollPolicy {
  intervalMs: number;
  maxAttempts: number;
  backoffFactor?: number;   // 1 (default) keeps the interval fixed
  maxIntervalMs?: number;
}

export type PollOutcome<T> =
  | { status: 'done'; value: T; attempts: number }
  | { status: 'timed_out'; attempts: number };

/**
 * Delay to wait after the given zero-based attempt
 */
export function delayFor(policy: PollPolicy, attempt: number): number {
  const factor = policy.backoffFactor ?? 1;
  const base = policy.intervalMs * Math.pow(factor, attempt);
  return policy.maxIntervalMs !== undefined ? Math.min(base, policy.maxIntervalMs) : base;
}

/**
 * Run `step` until it yields a value or the attempt budget is spent.
 * A step returning `undefined` means "not yet"; thrown errors propagate.
 */
export async function pollUntil<T>(
  step: (attempt: number) => Promise<T | undefined>,
  policy: PollPolicy,
  sleep: Sleep = realSleep
): Promise<PollOutcome<T>> {
  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    const value = await step(attempt);
    if (value !== undefined) {
      return { status: 'done', value, attempts: attempt + 1 };
    }
    if (attempt < policy.maxAttempts - 1) {
      await sleep(delayFor(policy, attempt));
    }
  }
  return { status: 'timed_out', attempts: policy.maxAttempts };
}

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
  shouldRetry: (error: unknown) => boolean;
}

/**
 * Re-invoke `fn` while it fails with a retryable error; the last error is rethrown.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  sleep: Sleep = realSleep
): Promise<T> {
  let lastError: unknown;
  for (let attempt = 0; attempt < policy.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!policy.shouldRetry(error) || attempt === policy.attempts - 1) {
        throw error;
      }
      await sleep(policy.delayMs);
    }
  }
  throw lastError;
}
