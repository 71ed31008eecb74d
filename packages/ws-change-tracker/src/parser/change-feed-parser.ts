/**
 * @file Change Feed Parser
 *
 * Turns the bytes of one WebSocket message into a batch of change entries.
 * Each message carries a JSON array; an empty array means the server has no
 * more changes right now.
 *
 * @module ws-change-tracker/parser/change-feed-parser
 */

import { z } from 'zod'
import type { ChangeEntry } from '../types.js'

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema of a single change row.
 */
export const ChangeEntrySchema = z.object({
  seq: z.union([z.string(), z.number()]),
  id: z.string().min(1),
  changes: z.array(z.object({ rev: z.string() })),
  deleted: z.boolean().optional(),
  removed: z.unknown().optional(),
  doc: z.record(z.unknown()).optional(),
})

/**
 * Schema of one message: a JSON array of change rows.
 */
export const ChangeBatchSchema = z.array(ChangeEntrySchema)

// =============================================================================
// Contract
// =============================================================================

/**
 * Incremental parser for change batches.
 *
 * Bytes of one message are fed with {@link ChangeFeedParser.write}, then
 * {@link ChangeFeedParser.end} completes the batch and readies the parser for
 * the next message.
 */
export interface ChangeFeedParser {
  /**
   * Feeds a chunk of the current message.
   *
   * @returns `false` if the bytes cannot be part of a valid message
   */
  write(chunk: Uint8Array): boolean

  /**
   * Completes the current message.
   *
   * @returns The parsed entries (possibly empty), or `null` if the message
   *   was not a valid change batch
   */
  end(): ChangeEntry[] | null
}

/**
 * Creates a parser. Called once per tracker.
 */
export type ChangeFeedParserFactory = () => ChangeFeedParser

// =============================================================================
// JsonChangeFeedParser
// =============================================================================

/**
 * {@link ChangeFeedParser} for JSON arrays of change rows.
 *
 * Bytes are decoded as UTF-8 as they arrive; invalid UTF-8 fails the write.
 * The batch is validated against {@link ChangeBatchSchema} when it ends.
 *
 * @example
 * ```typescript
 * const parser = new JsonChangeFeedParser()
 * parser.write(new TextEncoder().encode('[{"seq":1,"id":"a","changes":[{"rev":"1-x"}]}]'))
 * parser.end() // [{ seq: 1, id: 'a', changes: [{ rev: '1-x' }] }]
 * ```
 */
export class JsonChangeFeedParser implements ChangeFeedParser {
  private decoder = new TextDecoder('utf-8', { fatal: true })
  private text = ''
  private failed = false

  write(chunk: Uint8Array): boolean {
    if (this.failed) {
      return false
    }
    try {
      this.text += this.decoder.decode(chunk, { stream: true })
      return true
    } catch {
      this.failed = true
      return false
    }
  }

  end(): ChangeEntry[] | null {
    const failed = this.failed
    let text = this.text
    if (!failed) {
      try {
        text += this.decoder.decode()
      } catch {
        this.reset()
        return null
      }
    }
    this.reset()
    if (failed) {
      return null
    }

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch {
      return null
    }

    const result = ChangeBatchSchema.safeParse(json)
    return result.success ? result.data : null
  }

  private reset(): void {
    this.decoder = new TextDecoder('utf-8', { fatal: true })
    this.text = ''
    this.failed = false
  }
}

/**
 * Default {@link ChangeFeedParserFactory}.
 */
export const createJsonChangeFeedParser: ChangeFeedParserFactory = () => new JsonChangeFeedParser()
