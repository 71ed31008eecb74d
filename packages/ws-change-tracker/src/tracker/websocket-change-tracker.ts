/**
 * @file WebSocket Change Tracker
 *
 * Follows a remote change feed over a single WebSocket connection.
 *
 * Every socket callback is handed to the tracker's {@link ConfinedExecutor} and
 * handled there, so tracker state is only ever touched from one context. Each
 * handler first checks that its connection is still the current one; events
 * from a connection discarded by `stop()` or a failure change nothing.
 *
 * ## Event Flow
 *
 * ```
 *     [FeedSocket]                         [owning context]                  [consumer]
 *         |-- onOpen ------> post ------> send feed options ------------> emit('open')
 *         |-- onMessage ---> gate.acquire, post --> parse batch
 *         |                                   |-- [] (first) -----------> emit('caughtUp')
 *         |                                   |-- [rows] ---------------> emit('changes')
 *         |                                   |-- invalid --> close(1003)
 *         |                                   '-- gate.release, pause/resume
 *         |-- onError -----> post ------> failedWithError ---------------> emit('failed')
 *         |-- onClose -----> post ------> 1000 clean: stop() -------------> emit('stopped')
 *         |                               otherwise: failedWithError ---> emit('failed')
 *         |-- validateServerTrust --> invokeSync --> trust policy
 * ```
 *
 * @example
 * ```typescript
 * const tracker = new WebSocketChangeTracker({
 *   databaseURL: 'https://db.example.com/app',
 *   feed: { since: 0, includeDocs: true },
 *   authorizer: new BearerTokenAuthorizer('test-token'),
 * })
 *
 * tracker.on('changes', (entries) => store.apply(entries))
 * tracker.on('caughtUp', () => console.log('Up to date'))
 * tracker.on('failed', (error) => console.warn('Feed failed:', error.message))
 *
 * tracker.start()
 * // Later...
 * tracker.stop()
 * ```
 *
 * @module ws-change-tracker/tracker/websocket-change-tracker
 */

import { checkServerIdentity } from 'node:tls'
import type { PeerCertificate } from 'node:tls'
import { resolveWebSocketTrackerOptions } from '../config.js'
import type { ResolvedWebSocketChangeTrackerOptions, WebSocketChangeTrackerOptions } from '../config.js'
import { ChangeTrackerError, ChangeTrackerErrorCode, statusToError } from '../errors.js'
import { createJsonChangeFeedParser } from '../parser/change-feed-parser.js'
import type { ChangeFeedParser } from '../parser/change-feed-parser.js'
import { ConfinedExecutor } from '../transport/confined-executor.js'
import { CLOSE_NORMAL, CLOSE_UNHANDLED_TYPE, FeedSocketError, createWsFeedSocket } from '../transport/feed-socket.js'
import type { FeedSocket, FeedSocketFactory, FeedSocketListener } from '../transport/feed-socket.js'
import { buildHandshakeRequest, changesFeedURL, toSocketURL } from '../transport/request-builder.js'
import type { HandshakeRequest } from '../transport/request-builder.js'
import { BackpressureGate } from './backpressure.js'
import type { BackpressureInfo } from './backpressure.js'
import { ChangeTracker } from './change-tracker.js'

const textEncoder = new TextEncoder()

/**
 * One handshake attempt and everything received on it.
 *
 * The object itself is the identity handlers compare against the current
 * connection.
 */
class Connection {
  socket: FeedSocket | null = null

  constructor(
    readonly id: number,
    readonly request: HandshakeRequest,
    readonly gate: BackpressureGate
  ) {}
}

/**
 * Change tracker transport using a WebSocket change feed.
 *
 * @fires WebSocketChangeTracker#open
 */
export class WebSocketChangeTracker extends ChangeTracker {
  private readonly settings: ResolvedWebSocketChangeTrackerOptions
  private readonly executor: ConfinedExecutor
  private readonly parser: ChangeFeedParser
  private readonly socketFactory: FeedSocketFactory
  private readonly feedURL: URL

  /** The current connection, or null. */
  private connection: Connection | null = null

  /** Counter for connection IDs, for logging. */
  private connectionCount = 0

  /** False once stopped; late callbacks have no effect. */
  private running = false

  /** When the current connection was started. */
  private _startTime = 0

  /**
   * Creates a tracker. Does not connect; call {@link ChangeTracker.start}.
   *
   * @throws {ChangeTrackerError} With code `INVALID_OPTIONS` or `INVALID_URL`
   */
  constructor(options: WebSocketChangeTrackerOptions) {
    const resolved = resolveWebSocketTrackerOptions(options)
    super(resolved, 'WebSocketChangeTracker')
    this.settings = resolved
    this.feedURL = changesFeedURL(resolved.databaseURL)
    toSocketURL(this.feedURL)

    this.socketFactory = resolved.socketFactory ?? createWsFeedSocket
    this.parser = (resolved.parserFactory ?? createJsonChangeFeedParser)()
    this.executor = new ConfinedExecutor({
      onTaskError: (error) => this.handleTaskError(error),
    })
  }

  // -------------------------------------------------------------------------
  // Public Getters
  // -------------------------------------------------------------------------

  get changesFeedURL(): URL {
    return new URL(this.feedURL.href)
  }

  /**
   * Whether message effects are applied.
   */
  get isRunning(): boolean {
    return this.running
  }

  /**
   * Epoch milliseconds of the last start or reopen; 0 before the first.
   */
  get startTime(): number {
    return this._startTime
  }

  /**
   * Messages received on the current connection and not yet processed.
   */
  get pendingMessages(): number {
    return this.connection?.gate.pending ?? 0
  }

  /**
   * Backpressure state of the current connection.
   */
  get backpressure(): BackpressureInfo {
    return this.connection?.gate.info ?? { pending: 0, limit: this.settings.maxPendingMessages, saturated: false }
  }

  // -------------------------------------------------------------------------
  // Public Methods
  // -------------------------------------------------------------------------

  /**
   * Stops the tracker: no further message effects, the socket is closed and
   * any scheduled retry is cancelled. Idempotent.
   */
  override stop(): void {
    const connection = this.discardConnection()
    if (connection) {
      this.log('info', 'Stopping', { connection: connection.id })
      this.setState('closing')
      connection.socket?.close(CLOSE_NORMAL, 'Client stop')
    }
    super.stop()
  }

  /**
   * Pauses or resumes delivery. The socket also stays paused while too many
   * messages are in flight.
   */
  override setPaused(paused: boolean): void {
    super.setPaused(paused)
    if (this.connection) {
      this.updateSocketPause(this.connection)
    }
  }

  /**
   * Resolves once every socket event received so far has been handled.
   */
  whenIdle(): Promise<void> {
    return this.executor.whenIdle()
  }

  // -------------------------------------------------------------------------
  // Transport Hooks
  // -------------------------------------------------------------------------

  protected hasConnection(): boolean {
    return this.connection !== null
  }

  protected override runConfined(task: () => void): void {
    this.executor.post(task)
  }

  protected open(): boolean {
    if (this.connection) {
      return false
    }
    this.log('info', 'Starting', { url: this.feedURL.href })

    let request: HandshakeRequest
    try {
      request = buildHandshakeRequest({
        databaseURL: this.settings.databaseURL,
        heartbeatMs: this.settings.heartbeatMs,
        headers: this.settings.headers,
        cookieJar: this.settings.cookieJar,
        authorizer: this.settings.authorizer,
        tls: this.settings.tls,
      })
    } catch (error) {
      this.failedWithError(this.toTrackerError(error))
      return false
    }

    const connection = new Connection(
      ++this.connectionCount,
      request,
      new BackpressureGate(this.settings.maxPendingMessages)
    )
    this.log('debug', request.method, {
      connection: connection.id,
      url: request.socketURL.href,
      cookies: request.shouldHandleCookies,
    })

    this.connection = connection
    this.running = true
    this.resetConnectionState()
    this._startTime = Date.now()
    this.setState('connecting')

    try {
      const socket = this.socketFactory(request, this.createListener(connection))
      connection.socket = socket
      socket.open()
    } catch (error) {
      this.discardConnection()
      this.failedWithError(this.toTrackerError(error))
      return false
    }

    this.log('info', 'Started', { connection: connection.id, url: this.feedURL.href })
    return true
  }

  // -------------------------------------------------------------------------
  // Private Methods - Confinement
  // -------------------------------------------------------------------------

  /**
   * Listener for one connection's socket. Runs on the transport side: it only
   * counts messages and posts work to the executor.
   */
  private createListener(connection: Connection): FeedSocketListener {
    return {
      onOpen: () => this.executor.post(() => this.handleOpen(connection)),
      onMessage: (data) => {
        const saturated = connection.gate.acquire()
        // a superseded socket is closing and must keep reading its close frame
        if (saturated && connection === this.connection && connection.socket && !connection.socket.isPaused) {
          connection.socket.pause()
        }
        this.executor.post(() => this.handleMessage(connection, data))
      },
      onError: (error) => this.executor.post(() => this.handleError(connection, error)),
      onClose: (code, reason, wasClean) =>
        this.executor.post(() => this.handleClose(connection, code, reason, wasClean)),
      validateServerTrust: (host, certificate) =>
        this.executor.invokeSync(() => this.checkServerTrust(host, certificate)),
    }
  }

  // -------------------------------------------------------------------------
  // Private Methods - Event Handlers
  // -------------------------------------------------------------------------

  private handleOpen(connection: Connection): void {
    if (connection !== this.connection || !connection.socket) {
      return
    }
    this.log('debug', 'WebSocket opened', { connection: connection.id })
    this.connectionOpened()
    // Options travel post-upgrade; the handshake itself must stay a plain GET
    connection.socket.send(this.feedOptionsBody())
  }

  private handleMessage(connection: Connection, data: string | Uint8Array): void {
    try {
      if (typeof data !== 'string') {
        this.log('warn', 'Unhandled binary message', {
          code: ChangeTrackerErrorCode.UNSUPPORTED_MESSAGE,
          connection: connection.id,
          bytes: data.byteLength,
        })
        connection.socket?.close(CLOSE_UNHANDLED_TYPE, 'Unknown message')
        return
      }
      if (connection !== this.connection || !this.running || data.length === 0) {
        return
      }

      this.log('debug', 'Got a message', { connection: connection.id, length: data.length })
      const written = this.parser.write(textEncoder.encode(data))
      const entries = this.parser.end()
      if (!written || entries === null) {
        this.log('warn', "Couldn't parse message", {
          code: ChangeTrackerErrorCode.UNPARSEABLE_CHANGE,
          connection: connection.id,
          message: data,
        })
        connection.socket?.close(CLOSE_UNHANDLED_TYPE, 'Unparseable change entry')
        return
      }

      if (entries.length === 0) {
        this.markCaughtUp()
      } else {
        this.receivedChanges(entries)
      }
    } finally {
      connection.gate.release()
      this.updateSocketPause(connection)
    }
  }

  private handleError(connection: Connection, error: Error): void {
    if (connection !== this.connection) {
      return
    }
    this.discardConnection()
    this.failedWithError(this.translateError(error))
  }

  private handleClose(connection: Connection, code: number, reason: string, wasClean: boolean): void {
    if (connection !== this.connection) {
      return
    }
    this.discardConnection()

    if (wasClean && code === CLOSE_NORMAL) {
      this.log('info', 'Closed', { connection: connection.id })
      this.stop()
      return
    }

    const url = this.feedURL.href
    const detail = reason ? `: ${reason}` : ''
    this.failedWithError(
      new ChangeTrackerError(`Change feed closed with code ${code}${detail}`, ChangeTrackerErrorCode.ABNORMAL_CLOSURE, {
        data: { closeCode: code, reason, url },
      })
    )
  }

  private handleTaskError(error: unknown): void {
    this.log('error', 'Event handler threw', { error: error instanceof Error ? error.message : String(error) })
    const connection = this.discardConnection()
    connection?.socket?.close(CLOSE_NORMAL, 'Client error')
    this.failedWithError(this.toTrackerError(error))
  }

  // -------------------------------------------------------------------------
  // Private Methods - Helpers
  // -------------------------------------------------------------------------

  /**
   * Detaches the current connection; its late events are ignored from here on.
   */
  private discardConnection(): Connection | null {
    const connection = this.connection
    this.connection = null
    this.running = false
    return connection
  }

  /**
   * Pauses the socket while the consumer paused or too many messages are in
   * flight; resumes it otherwise.
   */
  private updateSocketPause(connection: Connection): void {
    const socket = connection.socket
    if (connection !== this.connection || !socket) {
      return
    }
    const shouldPause = this.paused || connection.gate.saturated
    if (shouldPause !== socket.isPaused) {
      this.log('debug', shouldPause ? 'PAUSE WebSocket' : 'RESUME WebSocket', {
        connection: connection.id,
        pending: connection.gate.pending,
      })
      if (shouldPause) {
        socket.pause()
      } else {
        socket.resume()
      }
    }
  }

  private checkServerTrust(host: string, certificate: PeerCertificate): boolean {
    const trusted = this.settings.trustPolicy
      ? this.settings.trustPolicy(host, certificate, this.changesFeedURL)
      : checkServerIdentity(host, certificate) === undefined
    if (!trusted) {
      this.log('warn', 'Server certificate rejected', { host, url: this.feedURL.href })
    }
    return trusted
  }

  /**
   * Maps a transport error onto the tracker's error representation.
   */
  private translateError(error: Error): ChangeTrackerError {
    if (error instanceof ChangeTrackerError) {
      return error
    }
    if (error instanceof FeedSocketError && error.httpStatus !== undefined) {
      return statusToError(error.httpStatus, this.feedURL.href)
    }
    return this.toTrackerError(error)
  }
}
