import { z } from 'zod'
import { ValidationError } from './errors.js'
import { AppIdSchema } from './types.js'
import {
  AuthTokenSchema,
  DashboardAccessOutSchema,
  HealthResponseSchema,
  HttpErrorOutSchema,
  HttpValidationErrorSchema,
  IdempotencyKeySchema
} from './api.js'

// =============================================================================
// Validation Helper Functions
// =============================================================================

/**
 * Generic validation function with error handling
 */
export function validate<T> (schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context?: string): T {
  try {
    return schema.parse(data)
  } catch (error) {
    if (error instanceof z.ZodError) {
      const firstIssue = error.issues[0]
      const field = firstIssue?.path?.join('.') || undefined
      const message = context
        ? `${context}: ${firstIssue?.message || 'Validation failed'}`
        : firstIssue?.message || 'Validation failed'

      throw new ValidationError(message, field)
    }
    throw error
  }
}

export type SafeValidationResult<T> =
  | { success: true, data: T }
  | { success: false, error: ValidationError }

/**
 * Safe validation that returns result object instead of throwing
 */
export function validateSafe<T> (schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): SafeValidationResult<T> {
  const result = schema.safeParse(data)
  if (result.success) {
    return { success: true, data: result.data }
  }
  const firstIssue = result.error.issues[0]
  return {
    success: false,
    error: new ValidationError(
      firstIssue?.message || 'Validation failed',
      firstIssue?.path?.join('.') || undefined
    )
  }
}

// =============================================================================
// Input Validators
// =============================================================================

export const validateAppId = (data: unknown) =>
  validate(AppIdSchema, data, 'Invalid app id')

export const validateAuthToken = (data: unknown) =>
  validate(AuthTokenSchema, data, 'Invalid auth token')

export const validateIdempotencyKey = (data: unknown) =>
  validate(IdempotencyKeySchema, data, 'Invalid idempotency key')

// =============================================================================
// Response Validators
// =============================================================================

export const validateDashboardAccessOut = (data: unknown) =>
  validate(DashboardAccessOutSchema, data, 'Invalid dashboard access response')

export const validateHealthResponse = (data: unknown) =>
  validate(HealthResponseSchema, data, 'Invalid health response')

export const parseHttpErrorOut = (data: unknown) =>
  validateSafe(HttpErrorOutSchema, data)

export const parseHttpValidationError = (data: unknown) =>
  validateSafe(HttpValidationErrorSchema, data)
