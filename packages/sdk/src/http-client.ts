import axios, { AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import {
  AbortedError,
  ApiError,
  AuthenticationError,
  AuthorizationError,
  ERROR_CODES,
  HEADERS,
  NetworkError,
  NotFoundError,
  RateLimitError,
  TimeoutError,
  parseHttpErrorOut,
  parseHttpValidationError,
  type Logger,
  type RequestOptions,
} from '@relayhook/shared';
import type { HttpClientConfig } from './config.js';
import { withRetry, type RetryConfig } from './retry.js';
import { USER_AGENT } from './version.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  body?: unknown;
  options?: RequestOptions;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON body; undefined for 204 */
  data: unknown;
  requestId: string;
}

type ResponseHeaders = AxiosResponse['headers'];

function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== name) continue;
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
  }
  return undefined;
}

/**
 * Retry-After in seconds, from either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.ceil(seconds) : undefined;
  }
  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Transport shared by every API class. Adds auth, request id and idempotency
 * headers, retries retryable failures and maps non-2xx responses to errors.
 */
export class HttpClient {
  private readonly axios: AxiosInstance;
  private readonly serverUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;
  private readonly logger: Logger;

  constructor(config: HttpClientConfig) {
    this.axios = config.axiosInstance ?? axios.create();
    this.serverUrl = config.serverUrl;
    this.token = config.token;
    this.timeoutMs = config.timeoutMs;
    this.retry = config.retry;
    this.logger = config.logger.child({ component: 'http-client' });
  }

  get baseUrl(): string {
    return this.serverUrl;
  }

  async request(request: HttpRequest): Promise<HttpResponse> {
    const options = request.options ?? {};
    const requestId = uuidv4();
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const headers = this.buildHeaders(request.method, options, requestId);
    const log = this.logger.child({ requestId, method: request.method, path: request.path });

    return withRetry(
      async (attempt) => {
        const attemptHeaders = attempt > 0
          ? { ...headers, [HEADERS.retryCount]: String(attempt) }
          : headers;

        log.debug({ attempt }, 'Sending request');
        const response = await this.send(request, attemptHeaders, timeoutMs, requestId, options.signal);

        if (response.status >= 200 && response.status < 300) {
          log.debug({ status: response.status }, 'Request succeeded');
          return {
            status: response.status,
            data: response.status === 204 ? undefined : response.data,
            requestId,
          };
        }

        throw this.toApiError(response, requestId);
      },
      this.retry,
      {
        signal: options.signal,
        abortError: () => new AbortedError(requestId),
        onRetry: (error, retry, delayMs) => {
          log.warn({ retry, delayMs, error }, 'Retrying request');
        },
      },
    );
  }

  private buildHeaders(method: HttpMethod, options: RequestOptions, requestId: string): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      if (name.toLowerCase() === HEADERS.authorization) continue;
      headers[name] = value;
    }

    headers[HEADERS.authorization] = `Bearer ${this.token}`;
    headers[HEADERS.userAgent] = USER_AGENT;
    headers.accept = 'application/json';
    headers[HEADERS.requestId] = requestId;

    const idempotencyKey = options.idempotencyKey ?? (method === 'POST' ? `auto_${uuidv4()}` : undefined);
    if (idempotencyKey) {
      headers[HEADERS.idempotencyKey] = idempotencyKey;
    }
    return headers;
  }

  private async send(
    request: HttpRequest,
    headers: Record<string, string>,
    timeoutMs: number,
    requestId: string,
    signal?: AbortSignal,
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await this.axios.request<unknown>({
        method: request.method,
        baseURL: this.serverUrl,
        url: request.path,
        data: request.body,
        headers,
        timeout: timeoutMs,
        signal,
        responseType: 'json',
        validateStatus: () => true,
      });
    } catch (error) {
      throw this.toTransportError(error, requestId, timeoutMs);
    }
  }

  private toTransportError(error: unknown, requestId: string, timeoutMs: number): unknown {
    if (axios.isCancel(error)) {
      return new AbortedError(requestId);
    }
    if (error instanceof AxiosError) {
      if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
        return new TimeoutError(timeoutMs, requestId);
      }
      return new NetworkError(error.message, requestId);
    }
    return error;
  }

  private toApiError(response: AxiosResponse<unknown>, requestId: string): ApiError {
    const { status, data } = response;
    const errorBody = parseHttpErrorOut(data);
    const message = errorBody.success
      ? errorBody.data.detail
      : response.statusText || `Request failed with status ${status}`;

    switch (status) {
      case 401:
        return new AuthenticationError(message, data, requestId);
      case 403:
        return new AuthorizationError(message, data, requestId);
      case 404:
        return new NotFoundError(message, data, requestId);
      case 422: {
        const validation = parseHttpValidationError(data);
        return new ApiError({
          message: validation.success
            ? validation.data.detail.map((item) => `${item.loc.join('.')}: ${item.msg}`).join('; ')
            : message,
          httpStatus: status,
          code: ERROR_CODES.VALIDATION_ERROR,
          details: data,
          correlationId: requestId,
        });
      }
      case 429:
        return new RateLimitError(
          message,
          parseRetryAfter(headerValue(response.headers, HEADERS.retryAfter)),
          data,
          requestId,
        );
      default:
        return new ApiError({
          message,
          httpStatus: status,
          code: errorBody.success ? errorBody.data.code : undefined,
          details: data,
          correlationId: requestId,
        });
    }
  }
}
