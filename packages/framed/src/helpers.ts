import { STATUS_CODES } from 'node:http'
import type { Duplex } from 'node:stream'
import { ErrorCode, FramedError } from '@framed-http/shared/errors'

/**
 * Write a minimal HTTP/1.1 error response carrying the error as JSON, then
 * end the transport.
 * @throws FramedError with CONNECTION_CLOSED when the transport is no longer writable
 */
export function sendError(
  io: Duplex,
  error: FramedError,
  headers: Record<string, string> = {}
): Promise<void> {
  if (io.destroyed || io.writableEnded) {
    return Promise.reject(
      new FramedError('Connection closed before response', ErrorCode.CONNECTION_CLOSED, {
        details: { traceId: error.traceId, reason: error.message },
        traceId: error.traceId,
      })
    )
  }

  const body = JSON.stringify(error.toResponse())
  const lines = [
    `HTTP/1.1 ${error.httpStatus} ${STATUS_CODES[error.httpStatus] ?? 'Error'}`,
    'content-type: application/json',
    `content-length: ${Buffer.byteLength(body)}`,
    ...Object.entries(headers).map(([name, value]) => `${name}: ${value}`),
  ]

  const writeFailed = (err: Error) =>
    new FramedError('Failed to write response', ErrorCode.CONNECTION_CLOSED, {
      details: { traceId: error.traceId, reason: err.message },
      traceId: error.traceId,
      cause: err,
    })

  return new Promise((resolve, reject) => {
    // a failed write also emits 'error'; it stays attached until then
    const onError = (err: Error) => reject(writeFailed(err))
    io.once('error', onError)

    io.end(`${lines.join('\r\n')}\r\n\r\n${body}`, (err?: Error | null) => {
      if (err) {
        reject(writeFailed(err))
        return
      }
      io.off('error', onError)
      resolve()
    })
  })
}
