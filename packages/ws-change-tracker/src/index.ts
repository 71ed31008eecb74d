/**
 * ws-change-tracker
 *
 * Follows a remote database's change feed over a WebSocket. Batches arrive
 * as `changes` events, an empty batch marks the tracker caught up, and
 * failures are retried with exponential backoff from the last sequence seen.
 *
 * @example
 * ```typescript
 * import { WebSocketChangeTracker, BearerTokenAuthorizer } from 'ws-change-tracker'
 *
 * const tracker = new WebSocketChangeTracker({
 *   databaseURL: 'https://db.example.com/app',
 *   authorizer: new BearerTokenAuthorizer('test-token'),
 * })
 * tracker.on('changes', (entries) => console.log(entries.length, 'changes'))
 * tracker.start()
 * ```
 *
 * @packageDocumentation
 * @module ws-change-tracker
 */

// =============================================================================
// Tracker Exports
// =============================================================================

export { ChangeTracker } from './tracker/change-tracker.js'
export { WebSocketChangeTracker } from './tracker/websocket-change-tracker.js'
export { BackpressureGate, DEFAULT_MAX_PENDING_MESSAGES } from './tracker/backpressure.js'
export { feedOptionsBody, serializeFeedOptions } from './tracker/feed-options.js'

export type { BackpressureInfo } from './tracker/backpressure.js'
export type { FeedOptions, FeedOptionsBody, FeedStyle } from './tracker/feed-options.js'

// =============================================================================
// Configuration Exports
// =============================================================================

export {
  DEFAULT_TRACKER_OPTIONS,
  TrackerOptionsSchema,
  WebSocketTrackerOptionsSchema,
  resolveTrackerOptions,
  resolveWebSocketTrackerOptions,
} from './config.js'

export type {
  ChangeTrackerOptions,
  ResolvedChangeTrackerOptions,
  ResolvedWebSocketChangeTrackerOptions,
  RetryOptions,
  TrustPolicy,
  WebSocketChangeTrackerOptions,
} from './config.js'

// =============================================================================
// Transport Exports
// =============================================================================

export {
  CHANGES_FEED_PATH,
  HEARTBEAT_TIMEOUT_RATIO,
  buildHandshakeRequest,
  changesFeedURL,
  toSocketURL,
} from './transport/request-builder.js'
export {
  CLOSE_ABNORMAL,
  CLOSE_NORMAL,
  CLOSE_UNHANDLED_TYPE,
  FeedSocketError,
  WsFeedSocket,
  createWsFeedSocket,
} from './transport/feed-socket.js'
export { ConfinedExecutor } from './transport/confined-executor.js'

export type { HandshakeRequest, HandshakeRequestInput, TlsSettings } from './transport/request-builder.js'
export type { FeedSocket, FeedSocketFactory, FeedSocketListener } from './transport/feed-socket.js'
export type { ConfinedExecutorOptions, ConfinedTask } from './transport/confined-executor.js'

// =============================================================================
// Parser Exports
// =============================================================================

export {
  ChangeBatchSchema,
  ChangeEntrySchema,
  JsonChangeFeedParser,
  createJsonChangeFeedParser,
} from './parser/change-feed-parser.js'

export type { ChangeFeedParser, ChangeFeedParserFactory } from './parser/change-feed-parser.js'

// =============================================================================
// Auth Exports
// =============================================================================

export { BasicAuthorizer, BearerTokenAuthorizer } from './auth/authorizer.js'
export { MemoryCookieJar } from './auth/cookie-jar.js'

export type { AuthorizableRequest, Authorizer } from './auth/authorizer.js'
export type { CookieJar } from './auth/cookie-jar.js'

// =============================================================================
// Errors and Types
// =============================================================================

export { ChangeTrackerError, ChangeTrackerErrorCode, isRetryableError, statusToError } from './errors.js'
export { createConsoleLogger } from './types.js'

export type { ChangeTrackerErrorOptions } from './errors.js'
export type {
  ChangeEntry,
  ChangeTrackerEventMap,
  ChangeTrackerLogger,
  LogLevel,
  RetryInfo,
  Sequence,
  TrackerState,
} from './types.js'
