// Shared types, errors, and utilities for the Relayhook SDK
// Zod schemas for the authentication API plus the error taxonomy every package uses

export const RELAYHOOK_VERSION = '0.1.0'

// =============================================================================
// Core Types and Schemas
// =============================================================================
export * from './types.js'

// =============================================================================
// API Request/Response Schemas
// =============================================================================
export * from './api.js'

// =============================================================================
// Error Classes and Utilities
// =============================================================================
export * from './errors.js'

// =============================================================================
// Validation Helper Functions
// =============================================================================
export * from './validation.js'

// =============================================================================
// Logging
// =============================================================================
export * from './logger.js'
