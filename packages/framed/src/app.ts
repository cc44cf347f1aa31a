/**
 * Application registry
 *
 * Collects route factories, activates them once per connection, and
 * dispatches each request to the first route whose pattern and method set
 * both accept it.
 */

import type { Duplex } from 'node:stream'
import { ErrorCode, FramedError, displayError } from '@framed-http/shared/errors'
import { createChildSpan, createTraceContext, type Logger } from '@framed-http/shared/logger'
import {
  ready,
  type Readiness,
  type RequestHeadInit,
  type Service,
  type ServiceFactory,
} from '@framed-http/shared/types'
import { sendError } from './helpers'
import { defaultLogger } from './logging'
import { FramedRequest, createRequestHead } from './request'
import { ResourceDef, parseUri } from './resource'
import type { HttpServiceFactory, RouteService, RouteServiceConfig, RouteServiceFactory } from './service'
import { State } from './state'

/**
 * A parsed request head together with the connection it arrived on
 */
export interface Connect<Io extends Duplex = Duplex> {
  head: RequestHeadInit
  io: Io
}

interface MountedFactory<Io extends Duplex, S> {
  resource: ResourceDef
  factory: RouteServiceFactory<Io, S>
}

interface MountedService<Io extends Duplex, S> {
  resource: ResourceDef
  service: RouteService<Io, S>
}

export class FramedApp<Io extends Duplex = Duplex, S = undefined>
  implements ServiceFactory<Connect<Io>, void, FramedError, RouteServiceConfig, FramedAppService<Io, S>>
{
  private readonly routes: MountedFactory<Io, S>[] = []
  private readonly state: State<S>
  private appLogger: Logger = defaultLogger()

  constructor(state: S) {
    this.state = new State(state)
  }

  static stateless<Io extends Duplex = Duplex>(): FramedApp<Io, undefined> {
    return new FramedApp<Io, undefined>(undefined)
  }

  /**
   * Mount a route. Its factory is created immediately; services are created
   * per connection by `newService`.
   */
  service(factory: HttpServiceFactory<Io, S>): this {
    this.routes.push({
      resource: new ResourceDef(factory.path()),
      factory: factory.create(),
    })
    return this
  }

  logger(logger: Logger): this {
    this.appLogger = logger
    return this
  }

  /**
   * Patterns in registration order
   */
  paths(): string[] {
    return this.routes.map(route => route.resource.source)
  }

  /**
   * @throws FramedError with SERVICE_INIT_FAILED if any route factory rejects
   */
  async newService(cfg: RouteServiceConfig = {}): Promise<FramedAppService<Io, S>> {
    const logger = cfg.logger ?? this.appLogger

    const services = await Promise.all(
      this.routes.map(({ resource, factory }) =>
        factory.newService({ logger }).then(
          service => ({ resource, service }),
          (error: unknown) => {
            throw new FramedError(
              `Failed to create service for ${resource.source}`,
              ErrorCode.SERVICE_INIT_FAILED,
              {
                details: { pattern: resource.source, reason: displayError(error) },
                cause: error,
              }
            )
          }
        )
      )
    )

    return new FramedAppService(services, this.state, logger)
  }
}

export class FramedAppService<Io extends Duplex = Duplex, S = undefined>
  implements Service<Connect<Io>, void, FramedError>
{
  constructor(
    private readonly routes: MountedService<Io, S>[],
    private readonly state: State<S>,
    private readonly logger: Logger
  ) {}

  pollReady(): Readiness<FramedError> {
    for (const { service } of this.routes) {
      const readiness = service.pollReady()
      if (readiness.status !== 'ready') {
        return readiness
      }
    }
    return ready()
  }

  /**
   * Dispatch one request. Unmatched requests get a 404 or 405 response
   * written to the transport; the returned promise always fulfils.
   */
  async call({ head, io }: Connect<Io>): Promise<void> {
    const requestHead = createRequestHead(head)
    const { path } = parseUri(requestHead.uri)
    const { method } = requestHead
    const trace = createTraceContext(requestHead.headers.get('x-trace-id') ?? undefined)
    const logger = this.logger.child(trace)

    const allowed: string[] = []
    let pathMatched = false

    for (const { resource, service } of this.routes) {
      const params = resource.match(path)
      if (params === null) {
        continue
      }
      pathMatched = true

      if (!service.accepts(method)) {
        allowed.push(...service.methods())
        continue
      }

      logger.child(createChildSpan(trace)).debug(`${method} ${path}`, { pattern: resource.source })
      return service.call(new FramedRequest(io, requestHead, this.state, params, trace.traceId))
    }

    const allow = [...new Set(allowed)]
    const error = pathMatched
      ? new FramedError(`Method ${method} not allowed for ${path}`, ErrorCode.METHOD_NOT_ALLOWED, {
          details: { path, method, allowed: allow },
          traceId: trace.traceId,
        })
      : new FramedError(`No route for ${path}`, ErrorCode.ROUTE_NOT_FOUND, {
          details: { path, method },
          traceId: trace.traceId,
        })

    logger.warn(error.message, { method, path })

    const headers: Record<string, string> = pathMatched ? { allow: allow.join(', ') } : {}
    await sendError(io, error, headers).catch((sendFailure: unknown) => {
      logger.warn(`Could not send ${error.httpStatus} response: ${displayError(sendFailure)}`, {
        method,
        path,
      })
    })
  }
}
