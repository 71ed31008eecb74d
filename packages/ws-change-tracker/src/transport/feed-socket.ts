/**
 * @file Feed Socket
 *
 * The transport primitive underneath the tracker. A {@link FeedSocket} opens
 * one WebSocket for one handshake request and reports everything that happens
 * to it through a {@link FeedSocketListener}. Framing, masking and ping/pong are
 * handled by the `ws` package.
 *
 * ## Event Flow
 *
 * ```
 *     [ws]                                   [FeedSocketListener]
 *       |-- 'open' -----------------------------> onOpen()
 *       |-- 'message' (text) -------------------> onMessage(string)
 *       |-- 'message' (binary) -----------------> onMessage(Uint8Array)
 *       |-- 'unexpected-response' --------------> onError(FeedSocketError{httpStatus})
 *       |-- 'error' ----------------------------> onError(error)
 *       |-- 'close' ----------------------------> onClose(code, reason, wasClean)
 *       |
 *     [tls] checkServerIdentity ----------------> validateServerTrust(host, cert)
 * ```
 *
 * @module ws-change-tracker/transport/feed-socket
 */

import { Agent } from 'node:https'
import type { PeerCertificate } from 'node:tls'
import WebSocket from 'ws'
import { ChangeTrackerError, ChangeTrackerErrorCode } from '../errors.js'
import type { HandshakeRequest, TlsSettings } from './request-builder.js'

// =============================================================================
// Close Codes
// =============================================================================

/** Clean, intentional closure */
export const CLOSE_NORMAL = 1000

/** Endpoint received a message type it cannot handle */
export const CLOSE_UNHANDLED_TYPE = 1003

/** Reported, never sent: the connection ended without a close frame */
export const CLOSE_ABNORMAL = 1006

// =============================================================================
// Contracts
// =============================================================================

/**
 * Receives the events of one {@link FeedSocket}.
 *
 * Callbacks run on the transport's side; implementations must hand them over
 * to their owning context rather than mutate state directly.
 */
export interface FeedSocketListener {
  /** The upgrade completed */
  onOpen(): void
  /** A frame arrived: text as a string, binary as bytes */
  onMessage(data: string | Uint8Array): void
  /** The handshake or the connection failed */
  onError(error: Error): void
  /** The connection closed; `wasClean` is false when no close frame was received */
  onClose(code: number, reason: string, wasClean: boolean): void
  /**
   * Decides whether to trust the server certificate. Must return synchronously:
   * the TLS handshake waits for the answer.
   */
  validateServerTrust(host: string, certificate: PeerCertificate): boolean
}

/**
 * One WebSocket connection for one handshake request.
 */
export interface FeedSocket {
  /** Starts the handshake. Events follow through the listener. */
  open(): void
  /** Sends a text frame */
  send(text: string): void
  /** Starts the closing handshake */
  close(code?: number, reason?: string): void
  /** Stops delivering messages until {@link FeedSocket.resume} */
  pause(): void
  /** Resumes message delivery */
  resume(): void
  /** Whether delivery is paused */
  readonly isPaused: boolean
}

/**
 * Creates the socket for a handshake request.
 */
export type FeedSocketFactory = (request: HandshakeRequest, listener: FeedSocketListener) => FeedSocket

/**
 * Transport-level error, carrying the HTTP status when the server refused the upgrade.
 */
export class FeedSocketError extends Error {
  /** HTTP status of the refused upgrade */
  readonly httpStatus?: number

  constructor(message: string, options?: { httpStatus?: number; cause?: unknown }) {
    super(message, { cause: options?.cause })
    this.name = 'FeedSocketError'
    this.httpStatus = options?.httpStatus
  }
}

// =============================================================================
// WsFeedSocket
// =============================================================================

/**
 * {@link FeedSocket} on top of the `ws` package.
 *
 * Secure connections go through a dedicated `https.Agent` carrying the TLS
 * settings, whose `checkServerIdentity` consults the listener's trust policy.
 * Node only calls it for certificate chains that verified, and only aborts on a
 * rejection while `rejectUnauthorized` is left on.
 *
 * @example
 * ```typescript
 * const socket = new WsFeedSocket(buildHandshakeRequest({ ... }), listener)
 * socket.open()
 * ```
 */
export class WsFeedSocket implements FeedSocket {
  private ws: WebSocket | null = null
  private handshakeRefused = false

  constructor(
    private readonly request: HandshakeRequest,
    private readonly listener: FeedSocketListener
  ) {}

  get isPaused(): boolean {
    return this.ws?.isPaused ?? false
  }

  open(): void {
    if (this.ws) {
      throw new FeedSocketError('Socket already opened')
    }

    const { socketURL, headers, timeoutMs, tls } = this.request
    const ws = new WebSocket(socketURL.href, {
      headers,
      handshakeTimeout: timeoutMs,
      agent: socketURL.protocol === 'wss:' ? this.createAgent(tls) : undefined,
    })
    this.ws = ws

    ws.on('open', () => this.listener.onOpen())

    ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      const bytes = rawDataToBuffer(data)
      this.listener.onMessage(isBinary ? new Uint8Array(bytes) : bytes.toString('utf8'))
    })

    ws.on('unexpected-response', (_req, res) => {
      const status = res.statusCode ?? 0
      this.handshakeRefused = true
      this.listener.onError(new FeedSocketError(`Unexpected server response: ${status}`, { httpStatus: status }))
      ws.terminate()
    })

    ws.on('error', (error: Error) => {
      // terminate() after a refused upgrade reports an abort we already covered
      if (this.handshakeRefused) {
        return
      }
      this.listener.onError(error)
    })

    ws.on('close', (code: number, reason: Buffer) => {
      this.listener.onClose(code, reason.toString('utf8'), code !== CLOSE_ABNORMAL)
    })
  }

  send(text: string): void {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN) {
      throw new FeedSocketError('WebSocket is not open')
    }
    this.ws.send(text)
  }

  close(code: number = CLOSE_NORMAL, reason?: string): void {
    if (!this.ws || this.ws.readyState === WebSocket.CLOSED) {
      return
    }
    // a paused socket would never read the peer's close frame
    this.ws.resume()
    this.ws.close(code, reason)
  }

  pause(): void {
    this.ws?.pause()
  }

  resume(): void {
    this.ws?.resume()
  }

  private createAgent(tls: TlsSettings | undefined): Agent {
    return new Agent({
      ...tls,
      checkServerIdentity: (host: string, certificate: PeerCertificate) =>
        this.listener.validateServerTrust(host, certificate)
          ? undefined
          : new ChangeTrackerError(`Server certificate for ${host} was rejected`, ChangeTrackerErrorCode.TRUST_REJECTED, {
              data: { host, url: this.request.feedURL.href },
            }),
    })
  }
}

/**
 * Default {@link FeedSocketFactory}.
 */
export const createWsFeedSocket: FeedSocketFactory = (request, listener) => new WsFeedSocket(request, listener)

function rawDataToBuffer(data: WebSocket.RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data)
  }
  if (Buffer.isBuffer(data)) {
    return data
  }
  return Buffer.from(data)
}
