/**
 * @file Tracker Configuration
 *
 * Option types for the change trackers and their validation. Numeric and URL
 * options are checked with zod and merged with defaults; capabilities such as
 * the authorizer or the socket factory are passed through untouched.
 *
 * @example
 * ```typescript
 * const resolved = resolveWebSocketTrackerOptions({
 *   databaseURL: 'https://db.example.com/app',
 *   heartbeatMs: 30_000,
 * })
 * resolved.maxPendingMessages // 2
 * resolved.retry.baseDelayMs // 2000
 * ```
 *
 * @module ws-change-tracker/config
 */

import type { PeerCertificate } from 'node:tls'
import { z } from 'zod'
import type { Authorizer } from './auth/authorizer.js'
import type { CookieJar } from './auth/cookie-jar.js'
import { ChangeTrackerError, ChangeTrackerErrorCode } from './errors.js'
import type { ChangeFeedParserFactory } from './parser/change-feed-parser.js'
import { DEFAULT_MAX_PENDING_MESSAGES } from './tracker/backpressure.js'
import type { FeedOptions } from './tracker/feed-options.js'
import type { FeedSocketFactory } from './transport/feed-socket.js'
import type { TlsSettings } from './transport/request-builder.js'
import type { ChangeTrackerLogger } from './types.js'

// =============================================================================
// Defaults
// =============================================================================

/**
 * Default configuration values.
 */
export const DEFAULT_TRACKER_OPTIONS = {
  heartbeatMs: 5 * 60 * 1000,
  maxPendingMessages: DEFAULT_MAX_PENDING_MESSAGES,
  retry: {
    maxRetries: Infinity,
    baseDelayMs: 2000,
    maxDelayMs: 10 * 60 * 1000,
  },
} as const

// =============================================================================
// Option Types
// =============================================================================

/**
 * Retry policy applied after a failure.
 */
export interface RetryOptions {
  /**
   * Retries allowed since the last successful open.
   * @defaultValue Infinity
   */
  maxRetries?: number
  /**
   * Delay before the first retry; doubles with every further retry.
   * @defaultValue 2000
   */
  baseDelayMs?: number
  /**
   * Upper bound of the retry delay.
   * @defaultValue 600000
   */
  maxDelayMs?: number
}

/**
 * Decides whether to trust a server certificate.
 *
 * Runs synchronously during the TLS handshake; it must not perform I/O.
 */
export type TrustPolicy = (host: string, certificate: PeerCertificate, feedURL: URL) => boolean

/**
 * Options shared by every change tracker transport.
 */
export interface ChangeTrackerOptions {
  /** Base URL of the remote database */
  databaseURL: string | URL
  /** Feed options sent to the server */
  feed?: FeedOptions
  /**
   * Heartbeat interval the server is asked to keep, in milliseconds.
   * @defaultValue 300000
   */
  heartbeatMs?: number
  /** Extra request headers */
  headers?: Record<string, string>
  /** Source of the `Authorization` header */
  authorizer?: Authorizer
  /** Cookie source; skipped when `headers` sets `Cookie` */
  cookieJar?: CookieJar
  /** Retry policy */
  retry?: RetryOptions
  /** Creates the change parser */
  parserFactory?: ChangeFeedParserFactory
  /**
   * Enable console logging, unless `logger` is given.
   * @defaultValue false
   */
  debug?: boolean
  /** Custom logger; takes precedence over `debug` */
  logger?: ChangeTrackerLogger
}

/**
 * Options of the WebSocket change tracker.
 *
 * @example
 * ```typescript
 * const options: WebSocketChangeTrackerOptions = {
 *   databaseURL: 'https://db.example.com/app',
 *   feed: { since: 100, includeDocs: true },
 *   authorizer: new BearerTokenAuthorizer('test-token'),
 *   maxPendingMessages: 4,
 * }
 * ```
 */
export interface WebSocketChangeTrackerOptions extends ChangeTrackerOptions {
  /** TLS settings for `wss:` connections */
  tls?: TlsSettings
  /** Server certificate policy; defaults to accepting what TLS verified */
  trustPolicy?: TrustPolicy
  /**
   * In-flight messages at which the socket is paused; 0 disables pausing.
   * @defaultValue 2
   */
  maxPendingMessages?: number
  /** Creates the socket; defaults to the `ws`-based socket */
  socketFactory?: FeedSocketFactory
}

/**
 * Shared options with defaults applied.
 */
export interface ResolvedChangeTrackerOptions extends Omit<ChangeTrackerOptions, 'heartbeatMs' | 'retry' | 'feed'> {
  databaseURL: URL
  feed: FeedOptions
  heartbeatMs: number
  retry: Required<RetryOptions>
}

/**
 * WebSocket options with defaults applied.
 */
export interface ResolvedWebSocketChangeTrackerOptions
  extends ResolvedChangeTrackerOptions,
    Omit<WebSocketChangeTrackerOptions, keyof ChangeTrackerOptions | 'maxPendingMessages'> {
  maxPendingMessages: number
}

// =============================================================================
// Schemas
// =============================================================================

const countOrInfinity = z
  .number()
  .nonnegative()
  .refine((n) => Number.isInteger(n) || n === Infinity, { message: 'Expected an integer or Infinity' })

/**
 * Schema of the validated numeric and URL options shared by every tracker.
 */
export const TrackerOptionsSchema = z.object({
  databaseURL: z.string().url(),
  heartbeatMs: z.number().int().positive().default(DEFAULT_TRACKER_OPTIONS.heartbeatMs),
  retry: z
    .object({
      maxRetries: countOrInfinity.default(DEFAULT_TRACKER_OPTIONS.retry.maxRetries),
      baseDelayMs: z.number().int().nonnegative().default(DEFAULT_TRACKER_OPTIONS.retry.baseDelayMs),
      maxDelayMs: z.number().int().nonnegative().default(DEFAULT_TRACKER_OPTIONS.retry.maxDelayMs),
    })
    .default({}),
  feedLimit: z.number().int().positive().optional(),
})

/**
 * Schema of the options only the WebSocket tracker reads.
 */
export const WebSocketTrackerOptionsSchema = z.object({
  maxPendingMessages: z.number().int().nonnegative().default(DEFAULT_TRACKER_OPTIONS.maxPendingMessages),
})

// =============================================================================
// Resolution
// =============================================================================

function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues
    const summary = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new ChangeTrackerError(`Invalid change tracker options: ${summary}`, ChangeTrackerErrorCode.INVALID_OPTIONS, {
      data: { issues },
    })
  }
  return result.data
}

/**
 * Validates shared tracker options and applies defaults.
 *
 * @throws {ChangeTrackerError} With code `INVALID_OPTIONS`
 */
export function resolveTrackerOptions(options: ChangeTrackerOptions): ResolvedChangeTrackerOptions {
  const valid = parseOptions(TrackerOptionsSchema, {
    databaseURL: String(options.databaseURL),
    heartbeatMs: options.heartbeatMs,
    retry: options.retry,
    feedLimit: options.feed?.limit,
  })
  return {
    ...options,
    databaseURL: new URL(valid.databaseURL),
    feed: { ...options.feed },
    heartbeatMs: valid.heartbeatMs,
    retry: valid.retry,
  }
}

/**
 * Validates WebSocket tracker options and applies defaults. The shared
 * options go through {@link resolveTrackerOptions} first.
 *
 * @throws {ChangeTrackerError} With code `INVALID_OPTIONS`
 */
export function resolveWebSocketTrackerOptions(
  options: WebSocketChangeTrackerOptions
): ResolvedWebSocketChangeTrackerOptions {
  const shared = resolveTrackerOptions(options)
  const valid = parseOptions(WebSocketTrackerOptionsSchema, { maxPendingMessages: options.maxPendingMessages })
  return {
    ...options,
    ...shared,
    maxPendingMessages: valid.maxPendingMessages,
  }
}
