import { z } from 'zod'

// =============================================================================
// API Routes
// =============================================================================

export const API_PREFIX = '/api/v1'

export const HEALTH_ROUTE = '/health'

/**
 * Authentication endpoint paths. Both are POST.
 */
export const AUTH_ROUTES = {
  dashboardAccess: (appId: string) =>
    `${API_PREFIX}/auth/dashboard-access/${encodeURIComponent(appId)}/`,
  logout: `${API_PREFIX}/auth/logout/`
} as const

// =============================================================================
// API Request/Response Schemas
// =============================================================================

/**
 * Health check response
 */
export const HealthResponseSchema = z.object({
  status: z.enum(['ok', 'degraded', 'down']),
  version: z.string(),
  uptimeSeconds: z.number().optional()
})

export type HealthResponse = z.infer<typeof HealthResponseSchema>

/**
 * Dashboard access grant: a one-time login link and the token behind it
 */
export const DashboardAccessOutSchema = z.object({
  url: z.string().url(),
  token: z.string().min(1)
})

export type DashboardAccessOut = z.infer<typeof DashboardAccessOutSchema>

/**
 * Generic error body returned for 4xx/5xx responses
 */
export const HttpErrorOutSchema = z.object({
  code: z.string(),
  detail: z.string()
})

export type HttpErrorOut = z.infer<typeof HttpErrorOutSchema>

export const ValidationErrorItemSchema = z.object({
  loc: z.array(z.union([z.string(), z.number()])),
  msg: z.string(),
  type: z.string()
})

export type ValidationErrorItem = z.infer<typeof ValidationErrorItemSchema>

/**
 * 422 response body
 */
export const HttpValidationErrorSchema = z.object({
  detail: z.array(ValidationErrorItemSchema)
})

export type HttpValidationError = z.infer<typeof HttpValidationErrorSchema>

// =============================================================================
// Common HTTP Headers
// =============================================================================

export const HEADERS = {
  authorization: 'authorization',
  idempotencyKey: 'idempotency-key',
  requestId: 'x-request-id',
  retryCount: 'x-retry-count',
  retryAfter: 'retry-after',
  userAgent: 'user-agent'
} as const

/**
 * Idempotency key header validation
 */
export const IdempotencyKeySchema = z.string()
  .min(1, 'Idempotency key cannot be empty')
  .max(128, 'Idempotency key cannot exceed 128 characters')
  .optional()

export type IdempotencyKey = z.infer<typeof IdempotencyKeySchema>

/**
 * Auth token validation (the value after "Bearer ")
 */
export const AuthTokenSchema = z.string()
  .min(1, 'Auth token cannot be empty')
  .regex(/^[A-Za-z0-9\-_.]+$/, 'Auth token may only contain letters, digits, "-", "_" and "."')

export type AuthToken = z.infer<typeof AuthTokenSchema>
