import { AbortedError, isRetryableError, RateLimitError } from '@relayhook/shared';

export interface RetryConfig {
  /** Extra attempts after the first one */
  numRetries: number;
  /** Wait before each retry; the last entry repeats */
  scheduleMs: readonly number[];
  /** Longest wait allowed before a retry; a longer one ends the retries */
  maxDelayMs?: number;
}

export const DEFAULT_MAX_RETRY_DELAY_MS = 5_000;

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  numRetries: 2,
  scheduleMs: [50, 100, 200],
  maxDelayMs: DEFAULT_MAX_RETRY_DELAY_MS,
};

export type RetryListener = (error: unknown, retry: number, delayMs: number) => void;

export interface RetryHooks {
  onRetry?: RetryListener;
  /** Aborts the wait between attempts and skips the remaining ones */
  signal?: AbortSignal;
  /** Error thrown when the signal aborts; defaults to AbortedError */
  abortError?: () => Error;
}

export function retryDelayMs(error: unknown, retry: number, config: RetryConfig): number {
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return error.retryAfter * 1000;
  }
  const { scheduleMs } = config;
  if (scheduleMs.length === 0) {
    return 0;
  }
  return scheduleMs[Math.min(retry, scheduleMs.length - 1)] ?? 0;
}

function sleep(ms: number, signal: AbortSignal | undefined, abortError: () => Error): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an operation, retrying errors flagged as retryable.
 * The operation receives the zero-based attempt number.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  config: RetryConfig,
  hooks: RetryHooks = {},
): Promise<T> {
  const { onRetry, signal } = hooks;
  const abortError = hooks.abortError ?? (() => new AbortedError());
  let attempt = 0;

  while (true) {
    if (signal?.aborted) {
      throw abortError();
    }
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= config.numRetries || !isRetryableError(error)) {
        throw error;
      }
      const delayMs = retryDelayMs(error, attempt, config);
      if (config.maxDelayMs !== undefined && delayMs > config.maxDelayMs) {
        throw error;
      }
      attempt += 1;
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, signal, abortError);
    }
  }
}
