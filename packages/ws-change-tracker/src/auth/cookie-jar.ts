/**
 * @file Cookie Jar
 *
 * The tracker reads cookies for the feed URL from a {@link CookieJar} when the
 * consumer has not set a `Cookie` header itself. {@link MemoryCookieJar} keeps
 * cookies for the lifetime of the process; persisting them is left to the
 * consumer.
 *
 * @module ws-change-tracker/auth/cookie-jar
 */

/**
 * Read access to stored cookies. Must tolerate concurrent reads from
 * several trackers.
 */
export interface CookieJar {
  /**
   * Returns the `Cookie` header value for a URL.
   *
   * @returns `name=value` pairs joined by `; `, or `undefined` when none match
   */
  getCookieHeader(url: URL): string | undefined
}

interface StoredCookie {
  name: string
  value: string
  domain: string
  hostOnly: boolean
  path: string
  secure: boolean
  expiresAt?: number
}

/**
 * In-memory cookie store with domain, path, secure and expiry matching.
 *
 * @example
 * ```typescript
 * const jar = new MemoryCookieJar()
 * jar.setCookie(new URL('https://db.example.com/app'), 'SyncSession=abc; Path=/app')
 * jar.getCookieHeader(new URL('https://db.example.com/app/_changes')) // 'SyncSession=abc'
 * ```
 */
export class MemoryCookieJar implements CookieJar {
  private cookies: StoredCookie[] = []

  /**
   * Stores a cookie from a `Set-Cookie` header value.
   *
   * A cookie with the same name, domain and path replaces the previous one.
   * A cookie whose `Max-Age` is zero or negative removes it.
   *
   * @param url - URL of the response that set the cookie
   * @param setCookie - The `Set-Cookie` header value
   * @param now - Current time in milliseconds
   */
  setCookie(url: URL, setCookie: string, now: number = Date.now()): void {
    const [pair, ...attributes] = setCookie.split(';')
    const separator = pair.indexOf('=')
    if (separator <= 0) {
      return
    }

    const cookie: StoredCookie = {
      name: pair.slice(0, separator).trim(),
      value: pair.slice(separator + 1).trim(),
      domain: url.hostname.toLowerCase(),
      hostOnly: true,
      path: defaultPath(url.pathname),
      secure: false,
    }

    for (const attribute of attributes) {
      const [rawKey, ...rest] = attribute.split('=')
      const key = rawKey.trim().toLowerCase()
      const value = rest.join('=').trim()
      switch (key) {
        case 'domain':
          if (value) {
            cookie.domain = value.replace(/^\./, '').toLowerCase()
            cookie.hostOnly = false
          }
          break
        case 'path':
          if (value.startsWith('/')) {
            cookie.path = value
          }
          break
        case 'secure':
          cookie.secure = true
          break
        case 'max-age': {
          const seconds = Number(value)
          if (Number.isFinite(seconds)) {
            cookie.expiresAt = now + seconds * 1000
          }
          break
        }
        case 'expires': {
          const time = Date.parse(value)
          if (!Number.isNaN(time) && cookie.expiresAt === undefined) {
            cookie.expiresAt = time
          }
          break
        }
      }
    }

    this.cookies = this.cookies.filter(
      (c) => !(c.name === cookie.name && c.domain === cookie.domain && c.path === cookie.path)
    )
    if (cookie.expiresAt === undefined || cookie.expiresAt > now) {
      this.cookies.push(cookie)
    }
  }

  getCookieHeader(url: URL, now: number = Date.now()): string | undefined {
    const host = url.hostname.toLowerCase()
    const secure = url.protocol === 'https:' || url.protocol === 'wss:'

    const matching = this.cookies.filter(
      (c) =>
        (c.expiresAt === undefined || c.expiresAt > now) &&
        (!c.secure || secure) &&
        domainMatches(host, c) &&
        pathMatches(url.pathname, c.path)
    )
    if (matching.length === 0) {
      return undefined
    }

    // Longer paths first
    matching.sort((a, b) => b.path.length - a.path.length)
    return matching.map((c) => `${c.name}=${c.value}`).join('; ')
  }

  /**
   * Removes every stored cookie.
   */
  clear(): void {
    this.cookies = []
  }

  /**
   * Number of stored cookies, expired ones included.
   */
  get size(): number {
    return this.cookies.length
  }
}

function defaultPath(pathname: string): string {
  const lastSlash = pathname.lastIndexOf('/')
  return lastSlash <= 0 ? '/' : pathname.slice(0, lastSlash)
}

function domainMatches(host: string, cookie: StoredCookie): boolean {
  if (cookie.hostOnly) {
    return host === cookie.domain
  }
  return host === cookie.domain || host.endsWith(`.${cookie.domain}`)
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) {
    return true
  }
  if (!requestPath.startsWith(cookiePath)) {
    return false
  }
  return cookiePath.endsWith('/') || requestPath.charAt(cookiePath.length) === '/'
}
