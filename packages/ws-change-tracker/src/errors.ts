/**
 * @file Change Tracker Errors
 *
 * A single error class carrying a machine-readable code, the retry decision
 * and, for handshake failures, the HTTP status the server answered with.
 *
 * @example
 * ```typescript
 * tracker.on('failed', (error) => {
 *   if (error instanceof ChangeTrackerError && error.code === ChangeTrackerErrorCode.HTTP_STATUS) {
 *     console.log('Server refused the handshake with', error.status)
 *   }
 * })
 * ```
 *
 * @module ws-change-tracker/errors
 */

import { STATUS_CODES } from 'node:http'

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for change tracker failures.
 */
export enum ChangeTrackerErrorCode {
  /** Handshake rejected with an HTTP status */
  HTTP_STATUS = 'HTTP_STATUS',
  /** Transport error without an HTTP status */
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  /** Peer sent a binary frame */
  UNSUPPORTED_MESSAGE = 'UNSUPPORTED_MESSAGE',
  /** Peer sent a frame that is not a valid change batch */
  UNPARSEABLE_CHANGE = 'UNPARSEABLE_CHANGE',
  /** Socket closed without a clean normal closure */
  ABNORMAL_CLOSURE = 'ABNORMAL_CLOSURE',
  /** The trust policy rejected the server certificate */
  TRUST_REJECTED = 'TRUST_REJECTED',
  /** The database URL cannot be turned into a WebSocket URL */
  INVALID_URL = 'INVALID_URL',
  /** Tracker options failed validation */
  INVALID_OPTIONS = 'INVALID_OPTIONS',
}

/**
 * HTTP statuses that mean retrying the same request cannot succeed.
 */
const PERMANENT_HTTP_STATUSES: ReadonlySet<number> = new Set([400, 401, 403, 404, 406])

/**
 * Codes that are never retried regardless of status.
 */
const PERMANENT_CODES: ReadonlySet<ChangeTrackerErrorCode> = new Set([
  ChangeTrackerErrorCode.TRUST_REJECTED,
  ChangeTrackerErrorCode.INVALID_URL,
  ChangeTrackerErrorCode.INVALID_OPTIONS,
])

/**
 * Options accepted by the {@link ChangeTrackerError} constructor.
 */
export interface ChangeTrackerErrorOptions {
  /** HTTP status of a rejected handshake */
  status?: number
  /** Overrides the retry decision derived from code and status */
  retryable?: boolean
  /** Additional context */
  data?: Record<string, unknown>
  /** Underlying error */
  cause?: unknown
}

// =============================================================================
// ChangeTrackerError
// =============================================================================

/**
 * Error reported by a change tracker through its `failed` event.
 */
export class ChangeTrackerError extends Error {
  /** Machine-readable error code */
  readonly code: ChangeTrackerErrorCode

  /** HTTP status, for {@link ChangeTrackerErrorCode.HTTP_STATUS} */
  readonly status?: number

  /** Whether the retry policy may reopen the connection */
  readonly retryable: boolean

  /** Additional context such as the close reason and the feed URL */
  readonly data?: Record<string, unknown>

  constructor(message: string, code: ChangeTrackerErrorCode, options: ChangeTrackerErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = 'ChangeTrackerError'
    this.code = code
    this.status = options.status
    this.data = options.data
    this.retryable = options.retryable ?? defaultRetryable(code, options.status)
  }
}

function defaultRetryable(code: ChangeTrackerErrorCode, status?: number): boolean {
  if (PERMANENT_CODES.has(code)) {
    return false
  }
  if (status !== undefined && PERMANENT_HTTP_STATUSES.has(status)) {
    return false
  }
  return true
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Translates an HTTP status from a rejected handshake into a tracker error.
 *
 * @param status - HTTP status code the server answered with
 * @param url - Feed URL the handshake was sent to
 *
 * @example
 * ```typescript
 * statusToError(401, 'http://db.local/app/_changes?feed=websocket').message
 * // => 'Unauthorized (401)'
 * ```
 */
export function statusToError(status: number, url: string): ChangeTrackerError {
  const text = STATUS_CODES[status] ?? 'Unexpected server response'
  return new ChangeTrackerError(`${text} (${status})`, ChangeTrackerErrorCode.HTTP_STATUS, {
    status,
    data: { url },
  })
}

/**
 * Whether the retry policy may retry after this error.
 *
 * Errors that are not {@link ChangeTrackerError}s are treated as transient.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ChangeTrackerError) {
    return error.retryable
  }
  return error instanceof Error
}
