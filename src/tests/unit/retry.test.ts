import { describe, it, expect, vi } from 'vitest';
import { retry } from '../../utils/retry.js';

class Transient extends Error {}

describe('retry', () => {
  it('returns the first successful result without sleeping', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const result = await retry(async () => 'ok', { delayMs: 100, isRetryable: () => true, sleep });
    expect(result).toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sleeps the fixed delay between retryable failures', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const onRetry = vi.fn();
    const operation = vi
      .fn<(attempt: number) => Promise<number>>()
      .mockRejectedValueOnce(new Transient('one'))
      .mockRejectedValueOnce(new Transient('two'))
      .mockImplementation(async (attempt) => attempt);

    const result = await retry(operation, {
      delayMs: 250,
      isRetryable: (error) => error instanceof Transient,
      sleep,
      onRetry,
    });

    expect(result).toBe(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([250, 250]);
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2]);
  });

  it('rethrows a non-retryable error immediately', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const error = new Error('fatal');
    await expect(
      retry(() => Promise.reject(error), { delayMs: 10, isRetryable: () => false, sleep })
    ).rejects.toBe(error);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after maxAttempts', async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const operation = vi.fn<(attempt: number) => Promise<void>>().mockRejectedValue(new Transient('down'));

    await expect(
      retry(operation, { delayMs: 0, maxAttempts: 3, isRetryable: () => true, sleep })
    ).rejects.toBeInstanceOf(Transient);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('stops before the next attempt once the signal aborts', async () => {
    const controller = new AbortController();
    const sleep = vi.fn(async () => {
      controller.abort();
    });
    const operation = vi.fn<(attempt: number) => Promise<void>>().mockRejectedValue(new Transient('down'));

    const error = await retry(operation, {
      delayMs: 5,
      isRetryable: () => true,
      sleep,
      signal: controller.signal,
    }).catch((reason: unknown) => reason);

    expect(error instanceof Error && error.name).toBe('AbortError');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
