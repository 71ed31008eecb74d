/**
 * @file Handshake Request Builder
 *
 * Composes the HTTP upgrade request for the WebSocket change feed: the feed
 * URL, the timeout derived from the heartbeat, consumer headers, cookies, the
 * authorizer's credential and the TLS settings. Building a request has no side
 * effects; the socket opens it later.
 *
 * The changes-feed options are not part of this request. A WebSocket handshake
 * must be a plain GET, so the options travel in the first frame after the
 * upgrade instead of a POST body.
 *
 * @module ws-change-tracker/transport/request-builder
 */

import type { ConnectionOptions } from 'node:tls'
import type { Authorizer } from '../auth/authorizer.js'
import type { CookieJar } from '../auth/cookie-jar.js'
import { ChangeTrackerError, ChangeTrackerErrorCode } from '../errors.js'

/**
 * Path and query appended to the database URL.
 */
export const CHANGES_FEED_PATH = '_changes?feed=websocket'

/**
 * Ratio between the handshake timeout and the heartbeat interval.
 */
export const HEARTBEAT_TIMEOUT_RATIO = 1.5

/**
 * TLS settings applied to secure connections.
 */
export type TlsSettings = Pick<
  ConnectionOptions,
  'ca' | 'cert' | 'key' | 'passphrase' | 'pfx' | 'rejectUnauthorized' | 'servername' | 'minVersion' | 'maxVersion'
>

/**
 * Inputs of {@link buildHandshakeRequest}.
 */
export interface HandshakeRequestInput {
  /** Base database URL, e.g. `https://db.example.com/app` */
  databaseURL: string | URL
  /** Heartbeat interval of the feed, in milliseconds */
  heartbeatMs: number
  /** Extra request headers */
  headers?: Readonly<Record<string, string>>
  /** Cookie source for the feed URL */
  cookieJar?: CookieJar
  /** Source of the `Authorization` header */
  authorizer?: Authorizer
  /** TLS settings for `wss:` connections */
  tls?: TlsSettings
}

/**
 * A fully composed handshake request.
 */
export interface HandshakeRequest {
  /** Always `GET` */
  method: 'GET'
  /** Feed URL in the database's own scheme, used for cookies and error reports */
  feedURL: URL
  /** Feed URL in `ws:`/`wss:` scheme, used to open the socket */
  socketURL: URL
  /** Handshake timeout in milliseconds */
  timeoutMs: number
  /** Headers to send with the upgrade request */
  headers: Record<string, string>
  /** Whether cookies from the jar were allowed for this request */
  shouldHandleCookies: boolean
  /** TLS settings, when configured */
  tls?: TlsSettings
}

/**
 * Resolves the changes-feed URL for a database URL.
 *
 * @example
 * ```typescript
 * changesFeedURL('http://db.local:4984/app').href
 * // => 'http://db.local:4984/app/_changes?feed=websocket'
 * ```
 */
export function changesFeedURL(databaseURL: string | URL): URL {
  let base: URL
  try {
    base = new URL(String(databaseURL))
  } catch (error) {
    throw new ChangeTrackerError(`Invalid database URL: ${String(databaseURL)}`, ChangeTrackerErrorCode.INVALID_URL, {
      cause: error,
    })
  }
  const href = base.href.endsWith('/') ? base.href : `${base.href}/`
  return new URL(CHANGES_FEED_PATH, href)
}

/**
 * Maps an `http:`/`https:` URL onto its WebSocket counterpart.
 *
 * @throws {ChangeTrackerError} With code `INVALID_URL` for any other scheme
 */
export function toSocketURL(url: URL): URL {
  const socketURL = new URL(url.href)
  switch (url.protocol) {
    case 'http:':
      socketURL.protocol = 'ws:'
      return socketURL
    case 'https:':
      socketURL.protocol = 'wss:'
      return socketURL
    case 'ws:':
    case 'wss:':
      return socketURL
    default:
      throw new ChangeTrackerError(
        `Unsupported URL scheme for a change feed: ${url.protocol}`,
        ChangeTrackerErrorCode.INVALID_URL,
        { data: { url: url.href } }
      )
  }
}

/**
 * Builds the handshake request for the WebSocket change feed.
 *
 * @example
 * ```typescript
 * const request = buildHandshakeRequest({
 *   databaseURL: 'https://db.example.com/app',
 *   heartbeatMs: 30_000,
 *   headers: { 'User-Agent': 'replicator' },
 * })
 * request.timeoutMs // 45000
 * request.socketURL.href // 'wss://db.example.com/app/_changes?feed=websocket'
 * ```
 */
export function buildHandshakeRequest(input: HandshakeRequestInput): HandshakeRequest {
  const feedURL = changesFeedURL(input.databaseURL)
  const socketURL = toSocketURL(feedURL)

  const headers: Record<string, string> = {}
  let shouldHandleCookies = true

  for (const [name, value] of Object.entries(input.headers ?? {})) {
    headers[name] = value
    if (name.toLowerCase() === 'cookie') {
      shouldHandleCookies = false
    }
  }

  if (shouldHandleCookies && input.cookieJar) {
    const cookie = input.cookieJar.getCookieHeader(feedURL)
    if (cookie) {
      headers.Cookie = cookie
    }
  }

  if (input.authorizer) {
    const authorization = input.authorizer.authorize({ method: 'GET', url: feedURL, headers })
    if (authorization) {
      headers.Authorization = authorization
    }
  }

  return {
    method: 'GET',
    feedURL,
    socketURL,
    timeoutMs: input.heartbeatMs * HEARTBEAT_TIMEOUT_RATIO,
    headers,
    shouldHandleCookies,
    tls: input.tls,
  }
}
