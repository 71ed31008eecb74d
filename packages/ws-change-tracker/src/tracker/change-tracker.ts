/**
 * @file Change Tracker Base
 *
 * Lifecycle, retry and pause handling shared by change tracker transports.
 * A transport subclass opens and discards connections; this base class decides
 * what happens after a failure, keeps the consumer's paused flag, remembers
 * the last sequence seen and emits the consumer events.
 *
 * ## Lifecycle
 *
 * ```
 *                     start()
 *     +--------+  ------------->  +------------+   open   +--------+
 *     |  idle  |                  | connecting | -------> |  open  |
 *     +--------+  <-------------  +------------+          +--------+
 *         ^          stop()             ^                     |
 *         |                             | retry timer         | stop() / clean close
 *         |                       +------------+              v
 *         +---------------------- |   failed   |         +---------+
 *                  stop()         +------------+         | closing | --> idle
 *                                       ^                +---------+
 *                                       |
 *                           error / abnormal close
 * ```
 *
 * @module ws-change-tracker/tracker/change-tracker
 */

import { EventEmitter } from 'events'
import type { ResolvedChangeTrackerOptions } from '../config.js'
import { ChangeTrackerError, ChangeTrackerErrorCode, isRetryableError } from '../errors.js'
import { serializeFeedOptions } from './feed-options.js'
import { createConsoleLogger } from '../types.js'
import type { ChangeEntry, ChangeTrackerLogger, LogLevel, RetryInfo, Sequence, TrackerState } from '../types.js'

/**
 * Base class of change tracker transports.
 *
 * Emits the events listed in {@link ChangeTrackerEventMap}.
 *
 * @fires ChangeTracker#stateChange
 * @fires ChangeTracker#changes
 * @fires ChangeTracker#caughtUp
 * @fires ChangeTracker#failed
 * @fires ChangeTracker#retrying
 * @fires ChangeTracker#stopped
 */
export abstract class ChangeTracker extends EventEmitter {
  /** Validated options. */
  protected readonly options: ResolvedChangeTrackerOptions

  /** Logger, or null when logging is off. */
  private readonly logger: ChangeTrackerLogger | null

  /** Current lifecycle state. */
  private _state: TrackerState = 'idle'

  /** Set once the current connection reported an empty batch. */
  private _caughtUp = false

  /** The consumer's paused flag. */
  private _paused = false

  /** Retries since the last successful open. */
  private _retryCount = 0

  /** Timer of the scheduled reopen. */
  private retryTimer?: ReturnType<typeof setTimeout>

  /** Most recent failure. */
  private _lastError?: Error

  /** Sequence of the newest change received. */
  private _lastSequence?: Sequence

  /** True between start() and the stopped event. */
  private active = false

  /** Bumped by every public start(). */
  private run = 0

  constructor(options: ResolvedChangeTrackerOptions, logPrefix: string) {
    super()
    this.options = options
    this.logger = options.logger ?? (options.debug ? createConsoleLogger(logPrefix) : null)
  }

  // -------------------------------------------------------------------------
  // Public Getters
  // -------------------------------------------------------------------------

  get databaseURL(): URL {
    return this.options.databaseURL
  }

  get state(): TrackerState {
    return this._state
  }

  /**
   * Whether the current connection has reported that no backlog remains.
   */
  get caughtUp(): boolean {
    return this._caughtUp
  }

  get paused(): boolean {
    return this._paused
  }

  get retryCount(): number {
    return this._retryCount
  }

  get lastError(): Error | undefined {
    return this._lastError
  }

  /**
   * Sequence of the newest change received; reconnects resume after it.
   */
  get lastSequence(): Sequence | undefined {
    return this._lastSequence ?? this.options.feed.since
  }

  /**
   * URL of the change feed.
   */
  abstract get changesFeedURL(): URL

  // -------------------------------------------------------------------------
  // Public Methods
  // -------------------------------------------------------------------------

  /**
   * Opens a new connection.
   *
   * @returns `false` if a connection is already current or could not be created
   */
  start(): boolean {
    if (this.hasConnection()) {
      this.log('warn', 'Start ignored, already connected', { url: this.changesFeedURL.href })
      return false
    }
    this.cancelRetry()
    this.run++
    this._retryCount = 0
    this._lastError = undefined
    this.active = true
    return this.open()
  }

  /**
   * Stops the tracker and cancels any scheduled retry. Idempotent.
   */
  stop(): void {
    this.cancelRetry()
    this.teardown('idle')
  }

  /**
   * Records whether the consumer wants delivery paused.
   */
  setPaused(paused: boolean): void {
    this._paused = paused
  }

  // -------------------------------------------------------------------------
  // Transport Hooks
  // -------------------------------------------------------------------------

  /**
   * Whether a connection is current.
   */
  protected abstract hasConnection(): boolean

  /**
   * Creates and opens a connection.
   *
   * @returns `false` if a connection is current or creation failed
   */
  protected abstract open(): boolean

  /**
   * Runs a task in the context that owns the tracker state.
   */
  protected runConfined(task: () => void): void {
    task()
  }

  // -------------------------------------------------------------------------
  // Shared Behavior
  // -------------------------------------------------------------------------

  /**
   * The feed options for the next connection, serialized.
   */
  protected feedOptionsBody(): string {
    return serializeFeedOptions(this.options.feed, this.options.heartbeatMs, this._lastSequence)
  }

  protected setState(state: TrackerState): void {
    if (this._state !== state) {
      this._state = state
      this.emit('stateChange', state)
    }
  }

  /**
   * Clears per-connection flags.
   */
  protected resetConnectionState(): void {
    this._caughtUp = false
  }

  /**
   * Called when a connection opened.
   */
  protected connectionOpened(): void {
    this._retryCount = 0
    this.setState('open')
    this.emit('open')
  }

  /**
   * Marks the connection caught up. Emits `caughtUp` only on the first call
   * per connection.
   */
  protected markCaughtUp(): void {
    if (this._caughtUp) {
      return
    }
    this._caughtUp = true
    this.log('info', 'Caught up', { url: this.changesFeedURL.href })
    this.emit('caughtUp')
  }

  /**
   * Delivers a non-empty batch and remembers its last sequence.
   */
  protected receivedChanges(entries: ChangeEntry[]): void {
    const last = entries[entries.length - 1]
    if (last) {
      this._lastSequence = last.seq
    }
    this.emit('changes', entries)
  }

  /**
   * Reports a failure and lets the retry policy decide what follows.
   *
   * Emits `failed` exactly once per call. Retryable errors schedule a reopen
   * while retries remain; anything else stops the tracker. A `failed`
   * listener that stops or restarts the tracker takes precedence.
   */
  protected failedWithError(error: Error): void {
    this._lastError = error
    this.log('error', 'Change tracker failed', {
      error: error.message,
      code: error instanceof ChangeTrackerError ? error.code : undefined,
      url: this.changesFeedURL.href,
    })
    this.setState('failed')
    const run = this.run
    this.emit('failed', error)

    if (!this.active || run !== this.run || this.hasConnection()) {
      return
    }
    if (isRetryableError(error) && this._retryCount < this.options.retry.maxRetries) {
      this.scheduleRetry()
    } else {
      this.teardown('failed')
    }
  }

  /**
   * Wraps anything thrown into a {@link ChangeTrackerError}.
   */
  protected toTrackerError(error: unknown): ChangeTrackerError {
    if (error instanceof ChangeTrackerError) {
      return error
    }
    const message = error instanceof Error ? error.message : String(error)
    return new ChangeTrackerError(message, ChangeTrackerErrorCode.CONNECTION_FAILED, {
      cause: error,
      data: { url: this.changesFeedURL.href },
    })
  }

  protected log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.logger?.[level]?.(message, data)
  }

  // -------------------------------------------------------------------------
  // Private Methods - Retry
  // -------------------------------------------------------------------------

  /**
   * Delay before retry number `retryCount + 1`.
   */
  private retryDelay(retryCount: number): number {
    const { baseDelayMs, maxDelayMs } = this.options.retry
    return Math.min(baseDelayMs * Math.pow(2, retryCount), maxDelayMs)
  }

  private scheduleRetry(): void {
    const delayMs = this.retryDelay(this._retryCount)
    this._retryCount++
    const info: RetryInfo = { attempt: this._retryCount, delayMs }
    this.log('info', 'Retrying', { ...info, url: this.changesFeedURL.href })
    this.emit('retrying', info)

    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined
      this.runConfined(() => {
        if (this.active && !this.hasConnection()) {
          this.open()
        }
      })
    }, delayMs)
  }

  private cancelRetry(): void {
    if (this.retryTimer) {
      clearTimeout(this.retryTimer)
      this.retryTimer = undefined
    }
  }

  /**
   * Shared teardown. Emits `stopped` once per run.
   */
  private teardown(finalState: TrackerState): void {
    const wasActive = this.active
    this.active = false
    this.setState(finalState)
    if (wasActive) {
      this.log('info', 'Stopped', { url: this.changesFeedURL.href })
      this.emit('stopped')
    }
  }
}
