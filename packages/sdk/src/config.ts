import type { AxiosInstance } from 'axios';
import { ConfigurationError, createLogger, type Logger } from '@relayhook/shared';
import { DEFAULT_MAX_RETRY_DELAY_MS, DEFAULT_RETRY_CONFIG, type RetryConfig } from './retry.js';

export const DEFAULT_SERVER_URL = 'https://api.relayhook.dev';
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ClientOptions {
  serverUrl?: string;
  timeoutMs?: number;
  numRetries?: number;
  retryScheduleMs?: readonly number[];
  /** A Retry-After longer than this fails the call instead of waiting */
  maxRetryDelayMs?: number;
  logger?: Logger;
  /** Preconfigured axios instance, e.g. with proxies or a custom adapter */
  axiosInstance?: AxiosInstance;
}

export interface HttpClientConfig {
  serverUrl: string;
  token: string;
  timeoutMs: number;
  retry: RetryConfig;
  logger: Logger;
  axiosInstance?: AxiosInstance;
}

export function normalizeServerUrl(serverUrl: string): string {
  return serverUrl.replace(/\/+$/, '');
}

export function resolveHttpClientConfig(token: string, options: ClientOptions = {}): HttpClientConfig {
  if (!token) {
    throw new ConfigurationError('Auth token is required');
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`Timeout must be a positive number of milliseconds, got ${timeoutMs}`);
  }

  const numRetries = options.numRetries ?? DEFAULT_RETRY_CONFIG.numRetries;
  if (!Number.isInteger(numRetries) || numRetries < 0) {
    throw new ConfigurationError(`Retry count must be a non-negative integer, got ${numRetries}`);
  }

  const scheduleMs = options.retryScheduleMs ?? DEFAULT_RETRY_CONFIG.scheduleMs;
  const maxDelayMs = options.maxRetryDelayMs ?? Math.max(DEFAULT_MAX_RETRY_DELAY_MS, ...scheduleMs);
  if (!Number.isFinite(maxDelayMs) || maxDelayMs < 0) {
    throw new ConfigurationError(`Maximum retry delay must be a non-negative number of milliseconds, got ${maxDelayMs}`);
  }

  return {
    serverUrl: normalizeServerUrl(options.serverUrl ?? DEFAULT_SERVER_URL),
    token,
    timeoutMs,
    retry: {
      numRetries,
      scheduleMs,
      maxDelayMs,
    },
    logger: options.logger ?? createLogger({ name: 'relayhook-sdk', defaultLevel: 'warn' }),
    axiosInstance: options.axiosInstance,
  };
}
