/**
 * Shared logger system for framed routing
 *
 * This module provides a structured logging system with:
 * - Multiple log levels (debug, info, warn, error)
 * - TraceID support for per-connection correlation
 * - JSON and human-readable output formats
 * - Pluggable sinks for capturing entries
 */

export {
  LogLevel,
  Logger,
  createLogger,
  type LogEntry,
  type LoggerConfig,
  type LogSink,
} from './logger'
export {
  generateTraceId,
  createTraceContext,
  createChildSpan,
  type TraceContext,
} from './trace'
