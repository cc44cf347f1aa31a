import type { Duplex } from 'node:stream'
import { ErrorCode, displayError, toFramedError, type FramedError } from '@framed-http/shared/errors'
import type { Logger } from '@framed-http/shared/logger'
import { Method, normalizeMethod, ready, type Readiness } from '@framed-http/shared/types'
import { cloneHandler, invokeHandler, type Handler, type HandlerResult } from './handler'
import { defaultLogger } from './logging'
import type { FramedRequest } from './request'
import type {
  HttpServiceFactory,
  RouteService,
  RouteServiceConfig,
  RouteServiceFactory,
} from './service'

/**
 * An empty method set accepts every method
 */
export function acceptsMethod(methods: readonly string[], method: string): boolean {
  return methods.length === 0 || methods.includes(normalizeMethod(method))
}

/**
 * Resource route definition
 *
 * Routes are usually declared through the builder:
 *
 * ```ts
 * const route = FramedRoute.build('/users')
 *   .method(Method.GET)
 *   .method(Method.POST)
 *   .to(async req => { ... })
 * ```
 */
export class FramedRoute<Io extends Duplex = Duplex, S = undefined>
  implements HttpServiceFactory<Io, S>
{
  private readonly methodSet: readonly string[]

  constructor(
    private readonly pattern: string,
    private readonly handler: Handler<Io, S>,
    methods: readonly string[] = []
  ) {
    this.methodSet = Object.freeze([...methods])
  }

  static build<Io extends Duplex = Duplex, S = undefined>(path: string): FramedRouteBuilder<Io, S> {
    return new FramedRouteBuilder<Io, S>(path)
  }

  static get<Io extends Duplex = Duplex, S = undefined>(path: string): FramedRouteBuilder<Io, S> {
    return FramedRoute.build<Io, S>(path).method(Method.GET)
  }

  static post<Io extends Duplex = Duplex, S = undefined>(path: string): FramedRouteBuilder<Io, S> {
    return FramedRoute.build<Io, S>(path).method(Method.POST)
  }

  static put<Io extends Duplex = Duplex, S = undefined>(path: string): FramedRouteBuilder<Io, S> {
    return FramedRoute.build<Io, S>(path).method(Method.PUT)
  }

  static delete<Io extends Duplex = Duplex, S = undefined>(path: string): FramedRouteBuilder<Io, S> {
    return FramedRoute.build<Io, S>(path).method(Method.DELETE)
  }

  /**
   * Returns a new route that also accepts `method`
   */
  method(method: Method | string): FramedRoute<Io, S> {
    return new FramedRoute(this.pattern, this.handler, [...this.methodSet, normalizeMethod(method)])
  }

  path(): string {
    return this.pattern
  }

  methods(): readonly string[] {
    return this.methodSet
  }

  create(): FramedRouteFactory<Io, S> {
    return new FramedRouteFactory(cloneHandler(this.handler), [...this.methodSet])
  }
}

/**
 * Produces one FramedRouteService per activation
 */
export class FramedRouteFactory<Io extends Duplex = Duplex, S = undefined>
  implements RouteServiceFactory<Io, S>
{
  constructor(
    private readonly handler: Handler<Io, S>,
    private readonly methodSet: readonly string[]
  ) {}

  async newService(cfg: RouteServiceConfig = {}): Promise<FramedRouteService<Io, S>> {
    return new FramedRouteService(
      cloneHandler(this.handler),
      [...this.methodSet],
      cfg.logger ?? defaultLogger()
    )
  }
}

export class FramedRouteService<Io extends Duplex = Duplex, S = undefined>
  implements RouteService<Io, S>
{
  constructor(
    private readonly handler: Handler<Io, S>,
    private readonly methodSet: readonly string[],
    private readonly logger: Logger
  ) {}

  pollReady(): Readiness<FramedError> {
    return ready()
  }

  methods(): readonly string[] {
    return this.methodSet
  }

  /**
   * Informational only; `call` does not consult the method set
   */
  accepts(method: string): boolean {
    return acceptsMethod(this.methodSet, method)
  }

  /**
   * Run the handler. The returned promise always fulfils: handler failures
   * are logged and do not propagate to the connection.
   */
  call(req: FramedRequest<Io, S>): Promise<void> {
    let outcome: HandlerResult
    try {
      outcome = invokeHandler(this.handler, req)
    } catch (error) {
      this.report(req, error)
      return Promise.resolve()
    }

    return Promise.resolve(outcome).then(
      () => undefined,
      (error: unknown) => this.report(req, error)
    )
  }

  private report(req: FramedRequest<Io, S>, error: unknown): void {
    const message = `Error in request handler: ${displayError(error)}`
    try {
      this.logger.error(message, toFramedError(error, ErrorCode.HANDLER_FAILED, req.traceId), {
        method: req.method,
        path: req.path,
      })
    } catch (logFailure) {
      // the logger itself failed; the call must still fulfil
      console.error(message, logFailure)
    }
  }
}

/**
 * Accumulates a pattern and accepted methods until a handler is attached
 */
export class FramedRouteBuilder<Io extends Duplex = Duplex, S = undefined> {
  private readonly methodSet: string[] = []

  constructor(private readonly pattern: string) {}

  method(method: Method | string): this {
    this.methodSet.push(normalizeMethod(method))
    return this
  }

  to(handler: Handler<Io, S>): FramedRoute<Io, S> {
    return new FramedRoute(this.pattern, handler, this.methodSet)
  }
}
