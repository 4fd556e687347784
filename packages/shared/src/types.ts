import { z } from 'zod'

// =============================================================================
// Core Types and Schemas
// =============================================================================

/**
 * Application identifier, either a server-issued id (app_...) or a
 * caller-chosen uid
 */
export const AppIdSchema = z.string()
  .min(1, 'App ID is required')
  .max(256, 'App ID cannot exceed 256 characters')
  .regex(/^[a-zA-Z0-9\-_.]+$/, 'App ID may only contain letters, digits, "-", "_" and "."')

export type AppId = z.infer<typeof AppIdSchema>

/**
 * Per-call overrides accepted by every API operation.
 * None of the keys are required; an empty object means "use client defaults".
 */
export interface RequestOptions {
  /** Sent as the idempotency-key header; POSTs get an automatic key when unset */
  idempotencyKey?: string
  /** Extra headers merged into the request */
  headers?: Record<string, string>
  /** Overrides the client-wide timeout for this call */
  timeoutMs?: number
  signal?: AbortSignal
}

/**
 * Region encoded in dashboard login links
 */
export const RegionSchema = z.enum(['us', 'eu', 'in'])
export type Region = z.infer<typeof RegionSchema>
