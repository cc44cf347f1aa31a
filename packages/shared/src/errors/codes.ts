/**
 * Error codes for framed routing and dispatch
 * Organized by category for better maintainability
 */
export enum ErrorCode {
  // ============================================
  // Routing (404, 405)
  // ============================================
  ROUTE_NOT_FOUND = 'ROUTE_NOT_FOUND',
  METHOD_NOT_ALLOWED = 'METHOD_NOT_ALLOWED',

  // ============================================
  // Dispatch (500)
  // ============================================
  HANDLER_FAILED = 'HANDLER_FAILED',
  SERVICE_INIT_FAILED = 'SERVICE_INIT_FAILED',

  // ============================================
  // Connection (500)
  // ============================================
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',

  // ============================================
  // Configuration (500)
  // ============================================
  INVALID_CONFIG = 'INVALID_CONFIG',

  // ============================================
  // General Errors (500)
  // ============================================
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Map error codes to HTTP status codes
 */
export const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  // Routing
  [ErrorCode.ROUTE_NOT_FOUND]: 404,
  [ErrorCode.METHOD_NOT_ALLOWED]: 405,

  // Dispatch
  [ErrorCode.HANDLER_FAILED]: 500,
  [ErrorCode.SERVICE_INIT_FAILED]: 500,

  // Connection
  [ErrorCode.CONNECTION_CLOSED]: 500,

  // Configuration
  [ErrorCode.INVALID_CONFIG]: 500,

  // General Errors
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.UNKNOWN_ERROR]: 500,
}
