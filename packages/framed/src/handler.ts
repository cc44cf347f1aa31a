import type { Duplex } from 'node:stream'
import type { FramedRequest } from './request'

/**
 * What a handler may return: nothing, or a promise of nothing.
 * A thrown error or a rejected promise is the handler's error outcome.
 */
export type HandlerResult = void | PromiseLike<void>

export type HandlerFn<Io extends Duplex = Duplex, S = undefined> = (
  req: FramedRequest<Io, S>
) => HandlerResult

/**
 * A handler with its own mutable state. Every route factory and every
 * service receives its own clone, so state never leaks across connections.
 */
export interface CloneableHandler<Io extends Duplex = Duplex, S = undefined> {
  handle(req: FramedRequest<Io, S>): HandlerResult
  clone(): CloneableHandler<Io, S>
}

export type Handler<Io extends Duplex = Duplex, S = undefined> =
  | HandlerFn<Io, S>
  | CloneableHandler<Io, S>

/**
 * Duplicate a handler for a new owner. Plain functions carry no state of
 * their own and are shared.
 */
export function cloneHandler<Io extends Duplex, S>(handler: Handler<Io, S>): Handler<Io, S> {
  return typeof handler === 'function' ? handler : handler.clone()
}

export function invokeHandler<Io extends Duplex, S>(
  handler: Handler<Io, S>,
  req: FramedRequest<Io, S>
): HandlerResult {
  return typeof handler === 'function' ? handler(req) : handler.handle(req)
}
