/**
 * Contracts between routes and the application registry
 */

import type { Duplex } from 'node:stream'
import type { FramedError } from '@framed-http/shared/errors'
import type { Logger } from '@framed-http/shared/logger'
import type { Service, ServiceFactory } from '@framed-http/shared/types'
import type { FramedRequest } from './request'

export interface RouteServiceConfig {
  logger?: Logger
}

/**
 * A live per-connection dispatcher for one route
 */
export interface RouteService<Io extends Duplex = Duplex, S = undefined>
  extends Service<FramedRequest<Io, S>, void, FramedError> {
  methods(): readonly string[]
  accepts(method: string): boolean
}

export type RouteServiceFactory<Io extends Duplex = Duplex, S = undefined> = ServiceFactory<
  FramedRequest<Io, S>,
  void,
  FramedError,
  RouteServiceConfig,
  RouteService<Io, S>
>

/**
 * Anything the registry can mount: a pattern plus a way to build its factory
 */
export interface HttpServiceFactory<Io extends Duplex = Duplex, S = undefined> {
  path(): string
  create(): RouteServiceFactory<Io, S>
}
