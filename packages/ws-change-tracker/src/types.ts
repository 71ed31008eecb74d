/**
 * @file Shared Types
 *
 * Change entries, tracker states, consumer events and the logger interface
 * shared across the tracker, the transport and the parser.
 *
 * @module ws-change-tracker/types
 */

// =============================================================================
// Change Entries
// =============================================================================

/**
 * A sequence identifier as sent by the server.
 *
 * Some servers use plain integers, others opaque strings.
 */
export type Sequence = string | number

/**
 * A single row of the change feed.
 *
 * @example
 * ```typescript
 * const entry: ChangeEntry = {
 *   seq: 42,
 *   id: 'doc-1',
 *   changes: [{ rev: '3-abc' }],
 * }
 * ```
 */
export interface ChangeEntry {
  /** Sequence of this change in the remote database */
  seq: Sequence
  /** Document ID */
  id: string
  /** Leaf revisions of the document */
  changes: Array<{ rev: string }>
  /** Set when the latest revision is a deletion */
  deleted?: boolean
  /** Set when the document left the filtered channel set */
  removed?: unknown
  /** Document body, present when `includeDocs` was requested */
  doc?: Record<string, unknown>
}

// =============================================================================
// Tracker State
// =============================================================================

/**
 * Lifecycle states of a change tracker.
 *
 * - `idle` -> `connecting`: `start()` or a scheduled retry
 * - `connecting` -> `open`: the socket opened
 * - `open` -> `closing` -> `idle`: `stop()` or a clean server close
 * - any -> `failed`: an error reached the failure path
 * - `failed` -> `connecting`: a scheduled retry or `start()`
 *
 * Being caught up is a flag within `open`, see {@link ChangeTrackerEventMap.caughtUp}.
 */
export type TrackerState = 'idle' | 'connecting' | 'open' | 'closing' | 'failed'

/**
 * Payload of the `retrying` event.
 */
export interface RetryInfo {
  /** 1-based number of this retry since the last successful open */
  attempt: number
  /** Delay before the reopen, in milliseconds */
  delayMs: number
}

/**
 * Events emitted by a change tracker.
 *
 * @example
 * ```typescript
 * tracker.on('changes', (entries: ChangeEntry[]) => store.apply(entries))
 * tracker.on('caughtUp', () => console.log('No more backlog'))
 * tracker.on('failed', (error: Error) => console.error(error))
 * ```
 */
export interface ChangeTrackerEventMap {
  /** The tracker moved to a new lifecycle state */
  stateChange: (state: TrackerState) => void
  /** The socket opened and the feed options were sent */
  open: () => void
  /** A non-empty batch of changes arrived */
  changes: (entries: ChangeEntry[]) => void
  /** An empty batch arrived; fires at most once per connection */
  caughtUp: () => void
  /** An error reached the failure path; fires once per failure */
  failed: (error: Error) => void
  /** A reopen was scheduled */
  retrying: (info: RetryInfo) => void
  /** The tracker stopped and will not reconnect on its own */
  stopped: () => void
}

// =============================================================================
// Logging Types
// =============================================================================

/**
 * Log levels supported by the tracker logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger interface for tracker diagnostics.
 *
 * All methods are optional; missing methods are no-ops.
 *
 * @example
 * ```typescript
 * const structuredLogger: ChangeTrackerLogger = {
 *   info: (msg, data) => console.info(JSON.stringify({ level: 'info', msg, ...data })),
 *   warn: (msg, data) => console.warn(JSON.stringify({ level: 'warn', msg, ...data })),
 * }
 * ```
 */
export interface ChangeTrackerLogger {
  debug?: (message: string, data?: Record<string, unknown>) => void
  info?: (message: string, data?: Record<string, unknown>) => void
  warn?: (message: string, data?: Record<string, unknown>) => void
  error?: (message: string, data?: Record<string, unknown>) => void
}

/**
 * Creates the logger used when `debug: true` is set without a custom logger.
 *
 * @param prefix - Tag printed before every message
 */
export function createConsoleLogger(prefix: string): ChangeTrackerLogger {
  return {
    debug: (msg, data) => console.debug(`[${prefix}] ${msg}`, data ?? ''),
    info: (msg, data) => console.info(`[${prefix}] ${msg}`, data ?? ''),
    warn: (msg, data) => console.warn(`[${prefix}] ${msg}`, data ?? ''),
    error: (msg, data) => console.error(`[${prefix}] ${msg}`, data ?? ''),
  }
}
