import type { Duplex } from 'node:stream'
import { generateTraceId } from '@framed-http/shared/logger'
import { normalizeMethod, type RequestHeadInit } from '@framed-http/shared/types'
import { parseUri, type MatchInfo } from './resource'
import type { State } from './state'

/**
 * Parsed request line and headers
 */
export interface RequestHead {
  readonly method: string
  readonly uri: string
  readonly version: string
  readonly headers: Headers
}

export function createRequestHead(init: RequestHeadInit): RequestHead {
  return {
    method: normalizeMethod(init.method),
    uri: init.uri,
    version: init.version ?? 'HTTP/1.1',
    headers: new Headers(init.headers),
  }
}

function isRequestHead(head: RequestHead | RequestHeadInit): head is RequestHead {
  return head.headers instanceof Headers && head.version !== undefined
}

/**
 * A request bound to its connection transport and the application state
 */
export class FramedRequest<Io extends Duplex = Duplex, S = undefined> {
  private readonly requestHead: RequestHead
  private readonly info: MatchInfo
  readonly traceId: string

  constructor(
    private readonly io: Io,
    head: RequestHead | RequestHeadInit,
    private readonly appState: State<S>,
    params: Record<string, string> = {},
    traceId?: string
  ) {
    this.requestHead = isRequestHead(head) ? head : createRequestHead(head)
    this.info = { path: params, query: parseUri(this.requestHead.uri).query }
    this.traceId = traceId ?? this.requestHead.headers.get('x-trace-id') ?? generateTraceId()
  }

  /**
   * The connection transport
   */
  framed(): Io {
    return this.io
  }

  state(): S {
    return this.appState.get()
  }

  head(): RequestHead {
    return this.requestHead
  }

  get method(): string {
    return this.requestHead.method
  }

  get uri(): string {
    return this.requestHead.uri
  }

  get version(): string {
    return this.requestHead.version
  }

  get headers(): Headers {
    return this.requestHead.headers
  }

  /**
   * Path component of the request target, without the query string
   */
  get path(): string {
    return parseUri(this.requestHead.uri).path
  }

  /**
   * Path params extracted by the matched pattern, plus query params
   */
  matchInfo(): MatchInfo {
    return this.info
  }

  intoParts(): [RequestHead, Io, State<S>] {
    return [this.requestHead, this.io, this.appState]
  }
}
