/**
 * @file Feed Socket Tests
 *
 * Tests for WsFeedSocket: the `ws` events it listens to and how they reach the
 * listener, the handshake options it passes on, and the TLS trust hook.
 *
 * The `ws` package is replaced by an in-process fake; nothing touches the network.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { Agent } from 'node:https'
import { FeedSocketError, WsFeedSocket } from '../../src/transport/feed-socket'
import type { FeedSocketListener } from '../../src/transport/feed-socket'
import { buildHandshakeRequest } from '../../src/transport/request-builder'
import { ChangeTrackerError, ChangeTrackerErrorCode } from '../../src/errors'
import { createTestCertificate } from '../helpers/certificate'

const { FakeWebSocket } = vi.hoisted(() => {
  type Listener = (...args: unknown[]) => void

  class FakeWebSocket {
    static readonly CONNECTING = 0
    static readonly OPEN = 1
    static readonly CLOSING = 2
    static readonly CLOSED = 3
    static instances: FakeWebSocket[] = []

    readyState = FakeWebSocket.CONNECTING
    isPaused = false
    sent: string[] = []
    closeCalls: Array<[number | undefined, string | undefined]> = []
    terminated = false
    pausedAtClose?: boolean
    private readonly listeners = new Map<string, Listener[]>()

    constructor(
      readonly url: string,
      readonly options: { headers?: Record<string, string>; handshakeTimeout?: number; agent?: unknown }
    ) {
      FakeWebSocket.instances.push(this)
    }

    on(event: string, listener: Listener): this {
      this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener])
      return this
    }

    emit(event: string, ...args: unknown[]): void {
      for (const listener of this.listeners.get(event) ?? []) {
        listener(...args)
      }
    }

    send(data: string): void {
      this.sent.push(data)
    }

    close(code?: number, reason?: string): void {
      this.closeCalls.push([code, reason])
      this.pausedAtClose = this.isPaused
      this.readyState = FakeWebSocket.CLOSING
    }

    pause(): void {
      this.isPaused = true
    }

    resume(): void {
      this.isPaused = false
    }

    terminate(): void {
      this.terminated = true
    }
  }

  return { FakeWebSocket }
})

vi.mock('ws', () => ({ default: FakeWebSocket }))

function createListener() {
  return {
    onOpen: vi.fn(),
    onMessage: vi.fn(),
    onError: vi.fn(),
    onClose: vi.fn(),
    validateServerTrust: vi.fn(() => true),
  } satisfies FeedSocketListener
}

function lastFake(): InstanceType<typeof FakeWebSocket> {
  const ws = FakeWebSocket.instances[FakeWebSocket.instances.length - 1]
  if (!ws) {
    throw new Error('No WebSocket was created')
  }
  return ws
}

const certificate = createTestCertificate()

describe('WsFeedSocket', () => {
  let listener: ReturnType<typeof createListener>

  beforeEach(() => {
    FakeWebSocket.instances = []
    listener = createListener()
  })

  function openSocket(databaseURL = 'http://db.local:4984/app') {
    const request = buildHandshakeRequest({
      databaseURL,
      heartbeatMs: 30_000,
      headers: { Authorization: 'Bearer test-token' },
    })
    const socket = new WsFeedSocket(request, listener)
    socket.open()
    return { socket, ws: lastFake() }
  }

  describe('open', () => {
    it('should connect to the socket URL with headers and handshake timeout', () => {
      const { ws } = openSocket()

      expect(ws.url).toBe('ws://db.local:4984/app/_changes?feed=websocket')
      expect(ws.options.headers).toEqual({ Authorization: 'Bearer test-token' })
      expect(ws.options.handshakeTimeout).toBe(45_000)
      expect(ws.options.agent).toBeUndefined()
    })

    it('should use a TLS agent for wss', () => {
      const { ws } = openSocket('https://db.example.com/app')

      expect(ws.url).toBe('wss://db.example.com/app/_changes?feed=websocket')
      expect(ws.options.agent).toBeInstanceOf(Agent)
    })

    it('should throw when opened twice', () => {
      const { socket } = openSocket()

      expect(() => socket.open()).toThrow('Socket already opened')
    })
  })

  describe('events', () => {
    it('should forward open', () => {
      const { ws } = openSocket()

      ws.emit('open')

      expect(listener.onOpen).toHaveBeenCalledTimes(1)
    })

    it('should deliver text frames as strings', () => {
      const { ws } = openSocket()

      ws.emit('message', Buffer.from('[]'), false)

      expect(listener.onMessage).toHaveBeenCalledWith('[]')
    })

    it('should deliver binary frames as bytes', () => {
      const { ws } = openSocket()

      ws.emit('message', Buffer.from([1, 2, 3]), true)

      expect(listener.onMessage).toHaveBeenCalledWith(new Uint8Array([1, 2, 3]))
    })

    it('should join fragmented frames', () => {
      const { ws } = openSocket()

      ws.emit('message', [Buffer.from('[{"seq":1,'), Buffer.from('"id":"a","changes":[]}]')], false)

      expect(listener.onMessage).toHaveBeenCalledWith('[{"seq":1,"id":"a","changes":[]}]')
    })

    it('should report a refused upgrade with its status and terminate', () => {
      const { ws } = openSocket()

      ws.emit('unexpected-response', {}, { statusCode: 401 })
      ws.emit('error', new Error('WebSocket was closed before the connection was established'))

      expect(listener.onError).toHaveBeenCalledTimes(1)
      const error = listener.onError.mock.calls[0]?.[0]
      expect(error).toBeInstanceOf(FeedSocketError)
      expect(error).toMatchObject({ httpStatus: 401, message: 'Unexpected server response: 401' })
      expect(ws.terminated).toBe(true)
    })

    it('should forward transport errors', () => {
      const { ws } = openSocket()
      const failure = new Error('connect ECONNREFUSED')

      ws.emit('error', failure)

      expect(listener.onError).toHaveBeenCalledWith(failure)
    })

    it('should report a normal close as clean', () => {
      const { ws } = openSocket()

      ws.emit('close', 1000, Buffer.from('bye'))

      expect(listener.onClose).toHaveBeenCalledWith(1000, 'bye', true)
    })

    it('should report an abnormal close as unclean', () => {
      const { ws } = openSocket()

      ws.emit('close', 1006, Buffer.alloc(0))

      expect(listener.onClose).toHaveBeenCalledWith(1006, '', false)
    })
  })

  describe('send and close', () => {
    it('should refuse to send before the socket is open', () => {
      const { socket } = openSocket()

      expect(() => socket.send('{}')).toThrow('WebSocket is not open')
    })

    it('should send text once open', () => {
      const { socket, ws } = openSocket()
      ws.readyState = FakeWebSocket.OPEN

      socket.send('{"heartbeat":30000}')

      expect(ws.sent).toEqual(['{"heartbeat":30000}'])
    })

    it('should close with a normal code by default', () => {
      const { socket, ws } = openSocket()

      socket.close()

      expect(ws.closeCalls).toEqual([[1000, undefined]])
    })

    it('should resume a paused socket before closing it', () => {
      const { socket, ws } = openSocket()
      socket.pause()

      socket.close(1000, 'Client stop')

      expect(ws.closeCalls).toEqual([[1000, 'Client stop']])
      expect(ws.pausedAtClose).toBe(false)
      expect(socket.isPaused).toBe(false)
    })

    it('should not close a closed socket', () => {
      const { socket, ws } = openSocket()
      ws.readyState = FakeWebSocket.CLOSED

      socket.close(1003, 'Unknown message')

      expect(ws.closeCalls).toEqual([])
    })

    it('should pause and resume delivery', () => {
      const { socket } = openSocket()

      socket.pause()
      expect(socket.isPaused).toBe(true)

      socket.resume()
      expect(socket.isPaused).toBe(false)
    })

    it('should report not paused before open', () => {
      const request = buildHandshakeRequest({ databaseURL: 'http://db.local/app', heartbeatMs: 1000 })

      expect(new WsFeedSocket(request, listener).isPaused).toBe(false)
    })
  })

  describe('server trust', () => {
    function agentOf(ws: InstanceType<typeof FakeWebSocket>): Agent {
      const agent = ws.options.agent
      if (!(agent instanceof Agent)) {
        throw new Error('Expected an https agent')
      }
      return agent
    }

    it('should apply TLS settings to the agent', () => {
      const request = buildHandshakeRequest({
        databaseURL: 'https://db.example.com/app',
        heartbeatMs: 1000,
        tls: { rejectUnauthorized: false },
      })
      new WsFeedSocket(request, listener).open()

      expect(agentOf(lastFake()).options.rejectUnauthorized).toBe(false)
    })

    it('should accept a certificate the listener trusts', () => {
      const { ws } = openSocket('https://db.example.com/app')

      const result = agentOf(ws).options.checkServerIdentity?.('db.example.com', certificate)

      expect(result).toBeUndefined()
      expect(listener.validateServerTrust).toHaveBeenCalledWith('db.example.com', certificate)
    })

    it('should fail the handshake for a certificate the listener rejects', () => {
      listener.validateServerTrust.mockReturnValue(false)
      const { ws } = openSocket('https://db.example.com/app')

      const result = agentOf(ws).options.checkServerIdentity?.('db.example.com', certificate)

      expect(result).toBeInstanceOf(ChangeTrackerError)
      expect(result).toMatchObject({
        code: ChangeTrackerErrorCode.TRUST_REJECTED,
        message: 'Server certificate for db.example.com was rejected',
        data: { host: 'db.example.com', url: 'https://db.example.com/app/_changes?feed=websocket' },
      })
    })
  })
})
