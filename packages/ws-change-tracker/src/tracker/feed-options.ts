/**
 * @file Changes Feed Options
 *
 * The options an HTTP tracker would put in its POST body. The WebSocket
 * tracker sends them as the first frame after the upgrade.
 *
 * @module ws-change-tracker/tracker/feed-options
 */

import type { Sequence } from '../types.js'

/**
 * Which revisions each change row lists.
 *
 * - `main_only`: only the winning revision
 * - `all_docs`: every leaf revision, conflicts included
 */
export type FeedStyle = 'main_only' | 'all_docs'

/**
 * Consumer-facing feed options.
 */
export interface FeedOptions {
  /** Start after this sequence */
  since?: Sequence
  /** Name of a server-side filter function */
  filter?: string
  /** Parameters passed to the filter */
  filterParams?: Record<string, unknown>
  /** Restrict the feed to these document IDs; overrides `filter` */
  docIDs?: string[]
  /** Include document bodies */
  includeDocs?: boolean
  /** List conflicting revisions; equivalent to `style: 'all_docs'` */
  includeConflicts?: boolean
  /** Maximum number of rows per batch */
  limit?: number
  /** Revision style; defaults to `main_only` */
  style?: FeedStyle
}

/**
 * Wire form of the feed options.
 */
export interface FeedOptionsBody {
  since?: Sequence
  style: FeedStyle
  heartbeat: number
  filter?: string
  query_params?: Record<string, unknown>
  doc_ids?: string[]
  include_docs?: boolean
  conflicts?: boolean
  limit?: number
}

/**
 * Builds the wire form of the feed options.
 *
 * @param options - Consumer options
 * @param heartbeatMs - Heartbeat interval in milliseconds
 * @param since - Sequence to resume from; wins over `options.since`
 *
 * @example
 * ```typescript
 * feedOptionsBody({ docIDs: ['a', 'b'] }, 30000, 12)
 * // => { since: 12, style: 'main_only', heartbeat: 30000, filter: '_doc_ids', doc_ids: ['a', 'b'] }
 * ```
 */
export function feedOptionsBody(options: FeedOptions, heartbeatMs: number, since?: Sequence): FeedOptionsBody {
  const body: FeedOptionsBody = {
    since: since ?? options.since,
    style: options.includeConflicts ? 'all_docs' : (options.style ?? 'main_only'),
    heartbeat: heartbeatMs,
  }

  if (options.docIDs && options.docIDs.length > 0) {
    body.filter = '_doc_ids'
    body.doc_ids = [...options.docIDs]
  } else if (options.filter) {
    body.filter = options.filter
    if (options.filterParams) {
      body.query_params = { ...options.filterParams }
    }
  }
  if (options.includeDocs) {
    body.include_docs = true
  }
  if (options.includeConflicts) {
    body.conflicts = true
  }
  if (options.limit !== undefined) {
    body.limit = options.limit
  }

  return body
}

/**
 * Serializes the feed options for the first frame. Undefined keys are omitted.
 */
export function serializeFeedOptions(options: FeedOptions, heartbeatMs: number, since?: Sequence): string {
  return JSON.stringify(feedOptionsBody(options, heartbeatMs, since))
}
