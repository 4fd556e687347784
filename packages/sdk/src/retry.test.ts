import { describe, it, expect, vi } from 'vitest';
import { AbortedError, ApiError, AuthenticationError, NetworkError, RateLimitError } from '@relayhook/shared';
import { DEFAULT_RETRY_CONFIG, retryDelayMs, withRetry } from './retry.js';

describe('retryDelayMs', () => {
  it('walks the schedule and repeats its last entry', () => {
    const error = new NetworkError('reset');
    expect(retryDelayMs(error, 0, DEFAULT_RETRY_CONFIG)).toBe(50);
    expect(retryDelayMs(error, 1, DEFAULT_RETRY_CONFIG)).toBe(100);
    expect(retryDelayMs(error, 2, DEFAULT_RETRY_CONFIG)).toBe(200);
    expect(retryDelayMs(error, 5, DEFAULT_RETRY_CONFIG)).toBe(200);
  });

  it('uses Retry-After for rate limits', () => {
    expect(retryDelayMs(new RateLimitError('Slow down', 2), 0, DEFAULT_RETRY_CONFIG)).toBe(2000);
  });

  it('returns zero for an empty schedule', () => {
    expect(retryDelayMs(new NetworkError('reset'), 0, { numRetries: 1, scheduleMs: [] })).toBe(0);
  });
});

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const operation = vi.fn(async (attempt: number) => `attempt-${attempt}`);

    await expect(withRetry(operation, DEFAULT_RETRY_CONFIG)).resolves.toBe('attempt-0');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('waits according to the schedule between retryable failures', async () => {
    vi.useFakeTimers();
    try {
      const operation = vi.fn(async (attempt: number) => {
        if (attempt < 2) {
          throw new ApiError({ message: 'Unavailable', httpStatus: 503 });
        }
        return 'done';
      });
      const onRetry = vi.fn();

      const promise = withRetry(operation, DEFAULT_RETRY_CONFIG, { onRetry });
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toBe('done');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([[1, 50], [2, 100]]);
    } finally {
      vi.useRealTimers();
    }
  });

  it('rethrows non-retryable errors immediately', async () => {
    const error = new AuthenticationError();
    const operation = vi.fn(async () => {
      throw error;
    });

    await expect(withRetry(operation, { numRetries: 3, scheduleMs: [0] })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('rethrows the last error once retries are exhausted', async () => {
    const errors = [new NetworkError('first'), new NetworkError('second')];
    const operation = vi.fn(async (attempt: number) => {
      throw errors[attempt];
    });

    await expect(withRetry(operation, { numRetries: 1, scheduleMs: [0] })).rejects.toBe(errors[1]);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('waits out a Retry-After within the cap', async () => {
    vi.useFakeTimers();
    try {
      const operation = vi.fn(async (attempt: number) => {
        if (attempt === 0) {
          throw new RateLimitError('Slow down', 2);
        }
        return 'done';
      });
      const onRetry = vi.fn();

      const promise = withRetry(operation, { numRetries: 1, scheduleMs: [0], maxDelayMs: 5000 }, { onRetry });
      await vi.advanceTimersByTimeAsync(1999);
      expect(operation).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);

      await expect(promise).resolves.toBe('done');
      expect(onRetry).toHaveBeenCalledWith(expect.any(RateLimitError), 1, 2000);
    } finally {
      vi.useRealTimers();
    }
  });

  it('gives up on a Retry-After beyond the cap without waiting', async () => {
    const error = new RateLimitError('Slow down', 86400);
    const operation = vi.fn(async () => {
      throw error;
    });
    const onRetry = vi.fn();

    await expect(withRetry(operation, { numRetries: 2, scheduleMs: [0], maxDelayMs: 5000 }, { onRetry }))
      .rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => 'done');

    await expect(withRetry(operation, DEFAULT_RETRY_CONFIG, { signal: controller.signal }))
      .rejects.toBeInstanceOf(AbortedError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('stops waiting as soon as the signal aborts', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const aborted = new Error('stopped');
      const operation = vi.fn(async () => {
        throw new NetworkError('reset');
      });

      const promise = withRetry(
        operation,
        { numRetries: 3, scheduleMs: [1000] },
        { signal: controller.signal, abortError: () => aborted },
      );
      const settled = promise.catch((reason: unknown) => reason);
      await vi.advanceTimersByTimeAsync(100);
      controller.abort();

      await expect(settled).resolves.toBe(aborted);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });
});
