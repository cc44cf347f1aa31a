/**
 * TraceID generation for per-connection log correlation
 */

export function generateTraceId(): string {
  const timestamp = Date.now().toString(36)
  const randomPart = Math.random().toString(36).substring(2, 15)
  return `trace_${timestamp}_${randomPart}`
}

export interface TraceContext {
  traceId: string
  spanId?: string
  parentSpanId?: string
  timestamp: number
}

/**
 * Create a new trace context, reusing an incoming trace id when present
 */
export function createTraceContext(traceId?: string): TraceContext {
  return {
    traceId: traceId || generateTraceId(),
    timestamp: Date.now(),
  }
}

/**
 * Create a child span from parent trace context
 */
export function createChildSpan(parent: TraceContext): TraceContext {
  return {
    traceId: parent.traceId,
    spanId: generateTraceId(),
    parentSpanId: parent.spanId,
    timestamp: Date.now(),
  }
}
