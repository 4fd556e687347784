import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@relayhook/shared';
import { DEFAULT_SERVER_URL, normalizeServerUrl, resolveHttpClientConfig } from './config.js';
import { DEFAULT_RETRY_CONFIG } from './retry.js';
import { silentLogger } from './test-utils.js';

describe('normalizeServerUrl', () => {
  it('strips trailing slashes', () => {
    expect(normalizeServerUrl('https://api.example.test///')).toBe('https://api.example.test');
    expect(normalizeServerUrl('https://api.example.test')).toBe('https://api.example.test');
  });
});

describe('resolveHttpClientConfig', () => {
  it('fills in defaults', () => {
    const config = resolveHttpClientConfig('testsk_placeholder', { logger: silentLogger });

    expect(config.serverUrl).toBe(DEFAULT_SERVER_URL);
    expect(config.timeoutMs).toBe(30000);
    expect(config.retry).toEqual(DEFAULT_RETRY_CONFIG);
    expect(config.token).toBe('testsk_placeholder');
    expect(config.axiosInstance).toBeUndefined();
  });

  it('applies overrides', () => {
    const config = resolveHttpClientConfig('testsk_placeholder', {
      serverUrl: 'http://localhost:4010/',
      timeoutMs: 500,
      numRetries: 0,
      retryScheduleMs: [10],
      logger: silentLogger,
    });

    expect(config.serverUrl).toBe('http://localhost:4010');
    expect(config.timeoutMs).toBe(500);
    expect(config.retry).toEqual({ numRetries: 0, scheduleMs: [10], maxDelayMs: 5000 });
    expect(config.logger).toBe(silentLogger);
  });

  it('caps retry waits at the longest schedule entry when it exceeds the default', () => {
    expect(resolveHttpClientConfig('testsk_placeholder', { retryScheduleMs: [8000] }).retry.maxDelayMs).toBe(8000);
    expect(resolveHttpClientConfig('testsk_placeholder', { maxRetryDelayMs: 250 }).retry.maxDelayMs).toBe(250);
  });

  it('requires a token', () => {
    expect(() => resolveHttpClientConfig('')).toThrow(ConfigurationError);
  });

  it('rejects invalid timeouts and retry counts', () => {
    expect(() => resolveHttpClientConfig('testsk_placeholder', { timeoutMs: 0 }))
      .toThrow('Timeout must be a positive number of milliseconds, got 0');
    expect(() => resolveHttpClientConfig('testsk_placeholder', { numRetries: -1 }))
      .toThrow('Retry count must be a non-negative integer, got -1');
    expect(() => resolveHttpClientConfig('testsk_placeholder', { numRetries: 1.5 })).toThrow(ConfigurationError);
    expect(() => resolveHttpClientConfig('testsk_placeholder', { maxRetryDelayMs: -1 }))
      .toThrow('Maximum retry delay must be a non-negative number of milliseconds, got -1');
  });
});
