export interface RetryOptions {
  /** Total attempts, including the first */
  attempts: number;
  /** Delay before the second attempt; doubles after each further failure */
  backoffMs: number;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/** Delay before attempt `attempt + 1` */
export function backoffDelay(baseMs: number, attempt: number): number {
  return baseMs * 2 ** (attempt - 1);
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run
 * out. The last error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= attempts || !options.shouldRetry(err)) throw err;
      const delayMs = backoffDelay(options.backoffMs, attempt);
      options.onRetry?.(err, attempt, delayMs);
      await delay(delayMs);
    }
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
