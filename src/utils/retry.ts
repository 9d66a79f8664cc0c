import { sleep as defaultSleep, type Sleep } from './sleep.js';

export interface RetryOptions {
  /** Fixed pause between attempts. */
  delayMs: number;
  /** Errors for which this returns false are rethrown immediately. */
  isRetryable: (error: unknown) => boolean;
  /** Omit to retry until success. */
  maxAttempts?: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number) => void;
}

export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      const exhausted = options.maxAttempts !== undefined && attempt >= options.maxAttempts;
      if (exhausted || !options.isRetryable(error)) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      await sleep(options.delayMs, options.signal);
    }
  }
}
