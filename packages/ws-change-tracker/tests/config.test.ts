/**
 * @file Tracker Configuration Tests
 *
 * Tests for option validation and default merging.
 */

import { describe, it, expect } from 'vitest'
import {
  DEFAULT_TRACKER_OPTIONS,
  resolveTrackerOptions,
  resolveWebSocketTrackerOptions,
} from '../src/config'
import { BearerTokenAuthorizer } from '../src/auth/authorizer'
import { ChangeTrackerError, ChangeTrackerErrorCode } from '../src/errors'

function resolveError(run: () => unknown): unknown {
  try {
    run()
  } catch (error) {
    return error
  }
  return undefined
}

describe('resolveWebSocketTrackerOptions', () => {
  it('should apply defaults', () => {
    const resolved = resolveWebSocketTrackerOptions({ databaseURL: 'https://db.example.com/app' })

    expect(resolved.databaseURL).toEqual(new URL('https://db.example.com/app'))
    expect(resolved.heartbeatMs).toBe(300_000)
    expect(resolved.maxPendingMessages).toBe(2)
    expect(resolved.retry).toEqual({ maxRetries: Infinity, baseDelayMs: 2000, maxDelayMs: 600_000 })
    expect(resolved.feed).toEqual({})
  })

  it('should expose the defaults', () => {
    expect(DEFAULT_TRACKER_OPTIONS.heartbeatMs).toBe(300_000)
    expect(DEFAULT_TRACKER_OPTIONS.retry.maxDelayMs).toBe(600_000)
  })

  it('should merge partial retry options with defaults', () => {
    const resolved = resolveWebSocketTrackerOptions({
      databaseURL: 'https://db.example.com/app',
      retry: { maxRetries: 3 },
    })

    expect(resolved.retry).toEqual({ maxRetries: 3, baseDelayMs: 2000, maxDelayMs: 600_000 })
  })

  it('should accept a URL object', () => {
    const resolved = resolveWebSocketTrackerOptions({ databaseURL: new URL('http://db.local:4984/app') })

    expect(resolved.databaseURL.href).toBe('http://db.local:4984/app')
  })

  it('should pass capabilities through', () => {
    const authorizer = new BearerTokenAuthorizer('test-token')
    const resolved = resolveWebSocketTrackerOptions({ databaseURL: 'https://db.example.com/app', authorizer })

    expect(resolved.authorizer).toBe(authorizer)
  })

  it('should copy the feed options', () => {
    const feed = { since: 10 }
    const resolved = resolveWebSocketTrackerOptions({ databaseURL: 'https://db.example.com/app', feed })

    expect(resolved.feed).toEqual({ since: 10 })
    expect(resolved.feed).not.toBe(feed)
  })

  it('should allow disabling backpressure', () => {
    const resolved = resolveWebSocketTrackerOptions({ databaseURL: 'https://db.example.com/app', maxPendingMessages: 0 })

    expect(resolved.maxPendingMessages).toBe(0)
  })

  it('should reject a non-positive heartbeat', () => {
    const error = resolveError(() =>
      resolveWebSocketTrackerOptions({ databaseURL: 'https://db.example.com/app', heartbeatMs: 0 })
    )

    expect(error).toBeInstanceOf(ChangeTrackerError)
    expect(error).toMatchObject({ code: ChangeTrackerErrorCode.INVALID_OPTIONS, retryable: false })
    expect(error).toHaveProperty('message', expect.stringMatching(/^Invalid change tracker options: heartbeatMs: /))
  })

  it('should reject an invalid database URL', () => {
    const error = resolveError(() => resolveWebSocketTrackerOptions({ databaseURL: 'not a url' }))

    expect(error).toHaveProperty('message', expect.stringMatching(/^Invalid change tracker options: databaseURL: /))
  })

  it('should reject a negative pending limit', () => {
    const error = resolveError(() =>
      resolveWebSocketTrackerOptions({ databaseURL: 'https://db.example.com/app', maxPendingMessages: -1 })
    )

    expect(error).toMatchObject({ code: ChangeTrackerErrorCode.INVALID_OPTIONS })
  })

  it('should reject a fractional retry count', () => {
    const error = resolveError(() =>
      resolveWebSocketTrackerOptions({ databaseURL: 'https://db.example.com/app', retry: { maxRetries: 1.5 } })
    )

    expect(error).toHaveProperty('message', 'Invalid change tracker options: retry.maxRetries: Expected an integer or Infinity')
  })

  it('should reject a non-positive feed limit', () => {
    const error = resolveError(() =>
      resolveWebSocketTrackerOptions({ databaseURL: 'https://db.example.com/app', feed: { limit: 0 } })
    )

    expect(error).toHaveProperty('message', expect.stringMatching(/^Invalid change tracker options: feedLimit: /))
  })
})

describe('resolveTrackerOptions', () => {
  it('should resolve the shared options', () => {
    const resolved = resolveTrackerOptions({ databaseURL: 'https://db.example.com/app', heartbeatMs: 30_000 })

    expect(resolved.heartbeatMs).toBe(30_000)
    expect(resolved).not.toHaveProperty('maxPendingMessages')
  })

  it('should resolve the shared part of the WebSocket options', () => {
    const options = { databaseURL: 'https://db.example.com/app', retry: { maxRetries: 3 } }

    const shared = resolveTrackerOptions(options)
    const resolved = resolveWebSocketTrackerOptions(options)

    expect(resolved.databaseURL.href).toBe(shared.databaseURL.href)
    expect(resolved.heartbeatMs).toBe(shared.heartbeatMs)
    expect(resolved.retry).toEqual(shared.retry)
  })
})
