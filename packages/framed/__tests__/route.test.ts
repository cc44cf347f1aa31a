/**
 * Unit tests for FramedRoute, its factory and its service
 */

import { PassThrough } from 'node:stream'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ErrorCode, FramedError } from '@framed-http/shared/errors'
import { LogLevel, createLogger, type LogEntry, type Logger } from '@framed-http/shared/logger'
import { Method } from '@framed-http/shared/types'
import {
  FramedRequest,
  FramedRoute,
  State,
  acceptsMethod,
  type CloneableHandler,
  type HandlerFn,
} from '../src'

function requestFor(path: string, method = 'GET'): FramedRequest<PassThrough> {
  return new FramedRequest(new PassThrough(), { method, uri: path }, new State(undefined))
}

class CountingHandler implements CloneableHandler<PassThrough> {
  constructor(public count = 0) {}

  handle(): void {
    this.count += 1
  }

  clone(): CountingHandler {
    return new CountingHandler(this.count)
  }
}

describe('FramedRoute', () => {
  let entries: LogEntry[]
  let logger: Logger

  beforeEach(() => {
    entries = []
    logger = createLogger({
      level: LogLevel.DEBUG,
      enableConsole: false,
      sink: entry => entries.push(entry),
    })
  })

  describe('builder', () => {
    it('should start without a method filter', () => {
      const route = FramedRoute.build('/users').to(() => {})

      expect(route.path()).toBe('/users')
      expect(route.methods()).toEqual([])
    })

    it('should seed exactly one method for each shorthand', () => {
      expect(FramedRoute.get('/x').to(() => {}).methods()).toEqual(['GET'])
      expect(FramedRoute.post('/x').to(() => {}).methods()).toEqual(['POST'])
      expect(FramedRoute.put('/x').to(() => {}).methods()).toEqual(['PUT'])
      expect(FramedRoute.delete('/x').to(() => {}).methods()).toEqual(['DELETE'])
    })

    it('should keep methods in call order', () => {
      const route = FramedRoute.build('/users')
        .method(Method.GET)
        .method(Method.POST)
        .method('patch')
        .to(() => {})

      expect(route.methods()).toEqual(['GET', 'POST', 'PATCH'])
    })

    it('should not share the method set with the builder after to()', () => {
      const builder = FramedRoute.build('/users').method(Method.GET)
      const route = builder.to(() => {})
      builder.method(Method.POST)

      expect(route.methods()).toEqual(['GET'])
    })

    it('should freeze the method set of a built route', () => {
      const route = FramedRoute.get('/x').to(() => {})

      expect(Object.isFrozen(route.methods())).toBe(true)
    })
  })

  describe('direct construction', () => {
    it('should return a new route from method()', () => {
      const route = new FramedRoute('/items', () => {})
      const withGet = route.method(Method.GET)

      expect(route.methods()).toEqual([])
      expect(withGet.methods()).toEqual(['GET'])
      expect(withGet.path()).toBe('/items')
    })
  })

  describe('method set', () => {
    it('should accept every verb used to build it, in any order', () => {
      const verbs = [Method.DELETE, Method.GET, Method.PUT, Method.POST]
      const forward = verbs.reduce((b, verb) => b.method(verb), FramedRoute.build('/a')).to(() => {})
      const backward = [...verbs]
        .reverse()
        .reduce((b, verb) => b.method(verb), FramedRoute.build('/a'))
        .to(() => {})

      for (const verb of verbs) {
        expect(acceptsMethod(forward.methods(), verb)).toBe(true)
        expect(acceptsMethod(backward.methods(), verb)).toBe(true)
      }
      expect(acceptsMethod(forward.methods(), Method.PATCH)).toBe(false)
    })

    it('should accept any method when empty', () => {
      expect(acceptsMethod([], 'OPTIONS')).toBe(true)
      expect(acceptsMethod([], 'BREW')).toBe(true)
    })

    it('should compare methods case-insensitively', () => {
      expect(acceptsMethod(['GET'], 'get')).toBe(true)
    })
  })

  describe('service', () => {
    it('should always report ready', async () => {
      const failing: HandlerFn<PassThrough> = () => {
        throw new Error('nope')
      }
      const service = await FramedRoute.get<PassThrough>('/x').to(failing).create().newService({ logger })

      expect(service.pollReady()).toEqual({ status: 'ready' })
      await service.call(requestFor('/x'))
      expect(service.pollReady()).toEqual({ status: 'ready' })
    })

    it('should resolve without logging when the handler succeeds', async () => {
      const handler = vi.fn(async () => {})
      const service = await FramedRoute.get<PassThrough>('/x').to(handler).create().newService({ logger })
      const req = requestFor('/x')

      await expect(service.call(req)).resolves.toBeUndefined()
      expect(handler).toHaveBeenCalledWith(req)
      expect(entries).toEqual([])
    })

    it('should resolve and log once when the handler rejects', async () => {
      const service = await FramedRoute.get<PassThrough>('/x')
        .to(async () => {
          throw new Error('disk full')
        })
        .create()
        .newService({ logger })

      await expect(service.call(requestFor('/x'))).resolves.toBeUndefined()
      expect(entries).toHaveLength(1)
      expect(entries[0]?.level).toBe(LogLevel.ERROR)
      expect(entries[0]?.message).toBe('Error in request handler: disk full')
      expect(entries[0]?.error?.name).toBe('FramedError')
      expect(entries[0]?.context).toEqual({ method: 'GET', path: '/x' })
    })

    it('should resolve and log once when the handler throws synchronously', async () => {
      const service = await FramedRoute.build<PassThrough>('/x')
        .to(() => {
          throw new FramedError('bad input', ErrorCode.INTERNAL_ERROR)
        })
        .create()
        .newService({ logger })

      await expect(service.call(requestFor('/x'))).resolves.toBeUndefined()
      expect(entries.map(entry => entry.message)).toEqual(['Error in request handler: bad input'])
    })

    it('should render non-Error rejections', async () => {
      const service = await FramedRoute.build<PassThrough>('/x')
        .to(() => Promise.reject('plain text'))
        .create()
        .newService({ logger })

      await service.call(requestFor('/x'))

      expect(entries[0]?.message).toBe('Error in request handler: plain text')
      expect(entries[0]?.error?.message).toBe('plain text')
    })

    it('should resolve when the rejection value cannot be stringified', async () => {
      const service = await FramedRoute.build<PassThrough>('/x')
        .to(() => Promise.reject(Object.create(null)))
        .create()
        .newService({ logger })

      await expect(service.call(requestFor('/x'))).resolves.toBeUndefined()
      expect(entries.map(entry => entry.message)).toEqual(['Error in request handler: [object Object]'])
    })

    it('should resolve when the logger itself fails', async () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
      const broken = createLogger({
        enableConsole: false,
        sink: () => {
          throw new Error('sink down')
        },
      })
      const service = await FramedRoute.build<PassThrough>('/x')
        .to(async () => {
          throw new Error('boom')
        })
        .create()
        .newService({ logger: broken })

      await expect(service.call(requestFor('/x'))).resolves.toBeUndefined()
      expect(stderr).toHaveBeenCalledTimes(1)
      expect(stderr.mock.calls[0]?.[0]).toBe('Error in request handler: boom')
      stderr.mockRestore()
    })

    it('should log through the environment logger when none is configured', async () => {
      const stdout = vi.spyOn(console, 'log').mockImplementation(() => {})
      const service = await FramedRoute.build<PassThrough>('/x')
        .to(async () => {
          throw new Error('boom')
        })
        .create()
        .newService()

      await service.call(requestFor('/x'))

      const lines = stdout.mock.calls
        .map(call => String(call[0]))
        .filter(line => line.includes('Error in request handler: boom'))
      expect(lines).toHaveLength(1)
      stdout.mockRestore()
    })

    it('should invoke the handler before call returns', async () => {
      const handler = vi.fn()
      const service = await FramedRoute.build<PassThrough>('/x').to(handler).create().newService({ logger })

      const pending = service.call(requestFor('/x'))
      expect(handler).toHaveBeenCalledTimes(1)
      await pending
    })

    it('should not gate calls on the method set', async () => {
      const handler = vi.fn()
      const service = await FramedRoute.get<PassThrough>('/x').to(handler).create().newService({ logger })

      expect(service.accepts('POST')).toBe(false)
      await service.call(requestFor('/x', 'POST'))
      expect(handler).toHaveBeenCalledTimes(1)
    })

    it('should give each service its own copy of the method set', async () => {
      const factory = FramedRoute.get<PassThrough>('/x').to(() => {}).create()
      const first = await factory.newService({ logger })
      const second = await factory.newService({ logger })

      expect(first.methods()).toEqual(['GET'])
      expect(first.methods()).not.toBe(second.methods())
    })
  })

  describe('factory activation', () => {
    it('should yield independent services from one factory', async () => {
      const template = new CountingHandler()
      const factory = FramedRoute.get<PassThrough>('/x').to(template).create()

      const [first, second] = await Promise.all([
        factory.newService({ logger }),
        factory.newService({ logger }),
      ])

      await first.call(requestFor('/x'))
      await first.call(requestFor('/x'))
      await second.call(requestFor('/x'))

      expect(template.count).toBe(0)
      expect(entries).toEqual([])
    })

    it('should start every clone from the template state', async () => {
      const seen: number[] = []
      class Recorder implements CloneableHandler<PassThrough> {
        private calls = 0
        handle(): void {
          this.calls += 1
          seen.push(this.calls)
        }
        clone(): Recorder {
          return new Recorder()
        }
      }

      const factory = FramedRoute.get<PassThrough>('/x').to(new Recorder()).create()
      const first = await factory.newService({ logger })
      const second = await factory.newService({ logger })

      await first.call(requestFor('/x'))
      await first.call(requestFor('/x'))
      await second.call(requestFor('/x'))

      expect(seen).toEqual([1, 2, 1])
    })
  })

  describe('users scenario', () => {
    it('should dispatch a successful handler without log lines', async () => {
      const route = FramedRoute.build<PassThrough>('/users')
        .method(Method.GET)
        .method(Method.POST)
        .to(async () => {})

      expect(route.path()).toBe('/users')

      const service = await route.create().newService({ logger })
      await expect(service.call(requestFor('/users'))).resolves.toBeUndefined()
      expect(entries).toHaveLength(0)
    })

    it('should swallow a failing handler with one error line', async () => {
      const route = FramedRoute.build<PassThrough>('/users')
        .method(Method.GET)
        .method(Method.POST)
        .to(async () => {
          throw new Error('boom')
        })

      const service = await route.create().newService({ logger })
      await expect(service.call(requestFor('/users', 'POST'))).resolves.toBeUndefined()

      const errors = entries.filter(entry => entry.level === LogLevel.ERROR)
      expect(errors).toHaveLength(1)
      expect(errors[0]?.message).toContain('boom')
    })
  })
})
