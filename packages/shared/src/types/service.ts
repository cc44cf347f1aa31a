/**
 * Service contracts shared by routes and the application registry
 *
 * A Service accepts one request at a time and reports readiness before each
 * call. A ServiceFactory produces fresh services, one per activation.
 */

/**
 * Readiness of a service to accept the next request
 */
export type Readiness<E = never> =
  | { status: 'ready' }
  | { status: 'pending' }
  | { status: 'failed'; error: E }

const READY: Readiness<never> = { status: 'ready' }

export function ready(): Readiness<never> {
  return READY
}

/**
 * A rejected promise from `call` is the service's error channel; `E` names the
 * values it may reject with.
 */
export interface Service<Req, Res, E = unknown> {
  pollReady(): Readiness<E>
  call(req: Req): Promise<Res>
}

/**
 * A reusable template that creates services. A rejected promise from
 * `newService` signals an initialization failure.
 */
export interface ServiceFactory<Req, Res, E, Cfg, Svc extends Service<Req, Res, E>> {
  newService(cfg: Cfg): Promise<Svc>
}
