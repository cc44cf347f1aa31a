/**
 * Error context interfaces providing detailed information about errors
 * Each context type corresponds to a specific category of operations
 */

/**
 * Routing error context
 */
export interface RouteErrorContext {
  path: string
  method: string
  allowed?: string[]
}

/**
 * Handler and service error context
 */
export interface DispatchErrorContext {
  pattern?: string
  reason: string
}

/**
 * Connection error context
 */
export interface ConnectionErrorContext {
  traceId?: string
  reason?: string
}

/**
 * Configuration validation error context
 */
export interface ConfigErrorContext {
  field: string
  value: unknown
  constraint: string
}

/**
 * Union type of all error contexts
 */
export type ErrorContext =
  | RouteErrorContext
  | DispatchErrorContext
  | ConnectionErrorContext
  | ConfigErrorContext
