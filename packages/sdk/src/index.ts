// TypeScript client for the Relayhook authentication API

export { SDK_VERSION, USER_AGENT } from './version.js';
export { Relayhook } from './client.js';
export { Authentication, type AuthenticationClient } from './authentication.js';
export { AuthenticationApi } from './api/authentication-api.js';
export { HealthApi } from './api/health-api.js';
export { HttpClient, parseRetryAfter, type HttpMethod, type HttpRequest, type HttpResponse } from './http-client.js';
export {
  DEFAULT_SERVER_URL,
  DEFAULT_TIMEOUT_MS,
  normalizeServerUrl,
  resolveHttpClientConfig,
  type ClientOptions,
  type HttpClientConfig,
} from './config.js';
export {
  DEFAULT_MAX_RETRY_DELAY_MS,
  DEFAULT_RETRY_CONFIG,
  retryDelayMs,
  withRetry,
  type RetryConfig,
  type RetryHooks,
  type RetryListener,
} from './retry.js';

export {
  RelayhookError,
  ApiError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  RateLimitError,
  NetworkError,
  TimeoutError,
  AbortedError,
  ValidationError,
  ConfigurationError,
  isRetryableError,
  type DashboardAccessOut,
  type HealthResponse,
  type RequestOptions,
} from '@relayhook/shared';
