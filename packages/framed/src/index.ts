/**
 * Framed routing
 *
 * Route declaration, per-connection route services, and the application
 * registry that dispatches requests bound to a persistent transport.
 */

export { FramedApp, FramedAppService } from './app'
export type { Connect } from './app'

export { FramedRoute, FramedRouteBuilder, FramedRouteFactory, FramedRouteService, acceptsMethod } from './route'

export { cloneHandler, invokeHandler } from './handler'
export type { CloneableHandler, Handler, HandlerFn, HandlerResult } from './handler'

export { FramedRequest, createRequestHead } from './request'
export type { RequestHead } from './request'

export { ResourceDef, parseUri } from './resource'
export type { MatchInfo } from './resource'

export { State } from './state'
export { sendError } from './helpers'

export type {
  HttpServiceFactory,
  RouteService,
  RouteServiceConfig,
  RouteServiceFactory,
} from './service'
