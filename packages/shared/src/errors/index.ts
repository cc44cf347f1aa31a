/**
 * Shared error system for framed routing
 *
 * This module provides a centralized error handling system with:
 * - Standardized error codes
 * - HTTP status mapping
 * - Error context for detailed information
 * - TraceID support for distributed tracing
 */

export { ErrorCode, ERROR_HTTP_STATUS } from './codes'
export type {
  RouteErrorContext,
  DispatchErrorContext,
  ConnectionErrorContext,
  ConfigErrorContext,
  ErrorContext,
} from './context'
export {
  type ErrorResponse,
  FramedError,
  createErrorResponse,
  displayError,
  isFramedError,
  toFramedError,
} from './response'
