import { ErrorCode, ERROR_HTTP_STATUS } from './codes'
import type { ErrorContext } from './context'

/**
 * Standardized error response structure
 */
export interface ErrorResponse {
  error: {
    message: string
    code: ErrorCode
    httpStatus: number
    details?: ErrorContext
    suggestion?: string
    traceId?: string
    timestamp?: string
  }
}

const ERROR_SUGGESTIONS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.ROUTE_NOT_FOUND]: 'Check that a route is registered for this path',
  [ErrorCode.METHOD_NOT_ALLOWED]: 'Use one of the methods the route accepts',
  [ErrorCode.SERVICE_INIT_FAILED]: 'Inspect the cause of the failing route factory',
  [ErrorCode.INVALID_CONFIG]: 'Check the LOG_LEVEL and LOG_JSON environment variables',
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  message: string,
  code: ErrorCode,
  options?: {
    details?: ErrorContext
    suggestion?: string
    traceId?: string
  }
): ErrorResponse {
  return {
    error: {
      message,
      code,
      httpStatus: ERROR_HTTP_STATUS[code],
      details: options?.details,
      suggestion: options?.suggestion ?? ERROR_SUGGESTIONS[code],
      traceId: options?.traceId,
      timestamp: new Date().toISOString(),
    },
  }
}

/**
 * Error raised by the routing and dispatch layers
 */
export class FramedError extends Error {
  public readonly code: ErrorCode
  public readonly httpStatus: number
  public readonly details?: ErrorContext
  public readonly suggestion?: string
  public readonly traceId?: string

  constructor(
    message: string,
    code: ErrorCode,
    options?: {
      details?: ErrorContext
      suggestion?: string
      traceId?: string
      cause?: unknown
    }
  ) {
    super(message)
    this.name = 'FramedError'
    this.code = code
    this.httpStatus = ERROR_HTTP_STATUS[code]
    this.details = options?.details
    this.suggestion = options?.suggestion ?? ERROR_SUGGESTIONS[code]
    this.traceId = options?.traceId

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FramedError)
    }

    if (options?.cause !== undefined) {
      this.cause = options.cause
    }
  }

  /**
   * Convert error to ErrorResponse format
   */
  toResponse(): ErrorResponse {
    return createErrorResponse(this.message, this.code, {
      details: this.details,
      suggestion: this.suggestion,
      traceId: this.traceId,
    })
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      httpStatus: this.httpStatus,
      details: this.details,
      suggestion: this.suggestion,
      traceId: this.traceId,
      stack: this.stack,
    }
  }
}

/**
 * Check if an error is a FramedError
 */
export function isFramedError(error: unknown): error is FramedError {
  return error instanceof FramedError
}

/**
 * Convert unknown error to FramedError
 */
export function toFramedError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR,
  traceId?: string
): FramedError {
  if (isFramedError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new FramedError(error.message, code, { traceId, cause: error })
  }

  return new FramedError(displayError(error), ErrorCode.UNKNOWN_ERROR, { traceId, cause: error })
}

/**
 * Render any thrown or rejected value as a single line of text
 */
export function displayError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  try {
    return String(error)
  } catch {
    // null-prototype objects and throwing toString()
    return Object.prototype.toString.call(error)
  }
}
