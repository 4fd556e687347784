import { z } from 'zod'

// =============================================================================
// Error Classes and Schemas
// =============================================================================

/**
 * Base Relayhook error class
 */
export class RelayhookError extends Error {
  constructor (
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
    public readonly correlationId?: string
  ) {
    super(message)
    this.name = 'RelayhookError'
  }

  toJSON () {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      correlationId: this.correlationId,
      stack: this.stack
    }
  }
}

/**
 * Validation error for invalid input data
 */
export class ValidationError extends RelayhookError {
  constructor (
    message: string,
    public readonly field?: string,
    correlationId?: string
  ) {
    super(message, 'VALIDATION_ERROR', false, correlationId)
    this.name = 'ValidationError'
  }
}

/**
 * Missing or malformed client configuration
 */
export class ConfigurationError extends RelayhookError {
  constructor (message: string) {
    super(message, 'CONFIGURATION_ERROR', false)
    this.name = 'ConfigurationError'
  }
}

export interface ApiErrorOptions {
  message: string
  httpStatus: number
  code?: string
  details?: unknown
  retryable?: boolean
  correlationId?: string
}

/**
 * Non-2xx response from the API
 */
export class ApiError extends RelayhookError {
  public readonly httpStatus: number
  public readonly details?: unknown

  constructor (options: ApiErrorOptions) {
    super(
      options.message,
      options.code ?? `HTTP_${options.httpStatus}`,
      options.retryable ?? options.httpStatus >= 500,
      options.correlationId
    )
    this.name = 'ApiError'
    this.httpStatus = options.httpStatus
    this.details = options.details
  }

  override toJSON () {
    return {
      ...super.toJSON(),
      httpStatus: this.httpStatus,
      details: this.details
    }
  }
}

/**
 * Authentication error for missing/invalid credentials (401)
 */
export class AuthenticationError extends ApiError {
  constructor (
    message: string = 'Authentication required',
    details?: unknown,
    correlationId?: string
  ) {
    super({ message, httpStatus: 401, code: 'AUTHENTICATION_ERROR', details, correlationId })
    this.name = 'AuthenticationError'
  }
}

/**
 * Authorization error for insufficient permissions (403)
 */
export class AuthorizationError extends ApiError {
  constructor (
    message: string = 'Insufficient permissions',
    details?: unknown,
    correlationId?: string
  ) {
    super({ message, httpStatus: 403, code: 'AUTHORIZATION_ERROR', details, correlationId })
    this.name = 'AuthorizationError'
  }
}

/**
 * Resource not found error (404)
 */
export class NotFoundError extends ApiError {
  constructor (
    message: string = 'Resource not found',
    details?: unknown,
    correlationId?: string
  ) {
    super({ message, httpStatus: 404, code: 'NOT_FOUND', details, correlationId })
    this.name = 'NotFoundError'
  }
}

/**
 * Rate limit exceeded error (429)
 */
export class RateLimitError extends ApiError {
  constructor (
    message: string = 'Rate limit exceeded',
    public readonly retryAfter?: number, // seconds
    details?: unknown,
    correlationId?: string
  ) {
    super({ message, httpStatus: 429, code: 'RATE_LIMIT_EXCEEDED', details, retryable: true, correlationId })
    this.name = 'RateLimitError'
  }
}

/**
 * Request never produced a response
 */
export class NetworkError extends RelayhookError {
  constructor (
    message: string,
    correlationId?: string,
    code: string = 'NETWORK_ERROR'
  ) {
    super(message, code, true, correlationId)
    this.name = 'NetworkError'
  }
}

/**
 * Request exceeded its timeout
 */
export class TimeoutError extends NetworkError {
  constructor (
    public readonly timeoutMs: number,
    correlationId?: string
  ) {
    super(`Request timed out after ${timeoutMs}ms`, correlationId, 'TIMEOUT_ERROR')
    this.name = 'TimeoutError'
  }
}

/**
 * Request cancelled through its AbortSignal
 */
export class AbortedError extends RelayhookError {
  constructor (correlationId?: string) {
    super('Request aborted', 'REQUEST_ABORTED', false, correlationId)
    this.name = 'AbortedError'
  }
}

// =============================================================================
// Error Code Constants
// =============================================================================

export const ERROR_CODES = {
  // General errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  AUTHENTICATION_ERROR: 'AUTHENTICATION_ERROR',
  AUTHORIZATION_ERROR: 'AUTHORIZATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Network errors
  NETWORK_ERROR: 'NETWORK_ERROR',
  TIMEOUT_ERROR: 'TIMEOUT_ERROR',
  REQUEST_ABORTED: 'REQUEST_ABORTED'
} as const

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES]

// =============================================================================
// Error summary
// =============================================================================

/**
 * Standardized error summary, as printed by the CLI
 */
export interface ErrorResponse {
  code: string
  message: string
  correlationId?: string
  httpStatus?: number
  field?: string // For validation errors
  retryable?: boolean
  retryAfter?: number // For rate limit errors
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Convert any error to a standardized ErrorResponse
 */
export function toErrorResponse (error: unknown, correlationId?: string): ErrorResponse {
  if (error instanceof RelayhookError) {
    return {
      code: error.code,
      message: error.message,
      correlationId: error.correlationId || correlationId,
      ...(error instanceof ApiError && { httpStatus: error.httpStatus }),
      ...(error instanceof ValidationError && error.field && { field: error.field }),
      ...(error.retryable && { retryable: true }),
      ...(error instanceof RateLimitError && error.retryAfter !== undefined && { retryAfter: error.retryAfter })
    }
  }

  if (error instanceof z.ZodError) {
    const firstIssue = error.issues[0]
    return {
      code: ERROR_CODES.VALIDATION_ERROR,
      message: firstIssue?.message || 'Validation failed',
      correlationId,
      field: firstIssue?.path?.join('.') || undefined
    }
  }

  if (error instanceof Error) {
    return {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: error.message,
      correlationId
    }
  }

  return {
    code: ERROR_CODES.INTERNAL_ERROR,
    message: 'An unexpected error occurred',
    correlationId
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError (error: unknown): boolean {
  if (error instanceof RelayhookError) {
    return error.retryable
  }
  return false
}

/**
 * Extract correlation ID from error
 */
export function getCorrelationId (error: unknown): string | undefined {
  if (error instanceof RelayhookError) {
    return error.correlationId
  }
  return undefined
}
