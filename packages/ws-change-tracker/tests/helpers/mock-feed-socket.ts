/**
 * @file Mock Feed Socket
 *
 * In-process FeedSocket for tracker tests. Records what the tracker does to it
 * and lets tests drive the listener callbacks.
 */

import type { FeedSocket, FeedSocketFactory, FeedSocketListener } from '../../src/transport/feed-socket'
import type { HandshakeRequest } from '../../src/transport/request-builder'

export class MockFeedSocket implements FeedSocket {
  opened = false
  isPaused = false
  sent: string[] = []
  closeCalls: Array<{ code?: number; reason?: string }> = []
  pauseCount = 0
  resumeCount = 0

  constructor(
    readonly request: HandshakeRequest,
    readonly listener: FeedSocketListener
  ) {}

  open(): void {
    this.opened = true
  }

  send(text: string): void {
    this.sent.push(text)
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason })
  }

  pause(): void {
    this.isPaused = true
    this.pauseCount++
  }

  resume(): void {
    this.isPaused = false
    this.resumeCount++
  }

  // Test helpers

  simulateOpen(): void {
    this.listener.onOpen()
  }

  simulateMessage(data: string | Uint8Array): void {
    this.listener.onMessage(data)
  }

  simulateChanges(entries: unknown[]): void {
    this.listener.onMessage(JSON.stringify(entries))
  }

  simulateError(error: Error): void {
    this.listener.onError(error)
  }

  simulateClose(code: number = 1000, reason: string = '', wasClean: boolean = code !== 1006): void {
    this.listener.onClose(code, reason, wasClean)
  }
}

/**
 * Socket factory recording every socket it creates.
 */
export function createMockSocketFactory() {
  const sockets: MockFeedSocket[] = []
  const factory: FeedSocketFactory = (request, listener) => {
    const socket = new MockFeedSocket(request, listener)
    sockets.push(socket)
    return socket
  }

  return {
    factory,
    sockets,
    latest(): MockFeedSocket {
      const socket = sockets[sockets.length - 1]
      if (!socket) {
        throw new Error('No socket was created')
      }
      return socket
    },
  }
}

/**
 * A change row as the server sends it.
 */
export function changeRow(seq: number | string, id: string, rev: string = '1-a') {
  return { seq, id, changes: [{ rev }] }
}
