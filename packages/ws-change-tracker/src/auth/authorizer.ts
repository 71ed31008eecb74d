/**
 * @file Handshake Authorizers
 *
 * The tracker asks its authorizer for an `Authorization` header value while
 * building the handshake request. How the credential is computed is up to the
 * authorizer; two simple ones are provided here.
 *
 * @example Static bearer token
 * ```typescript
 * const tracker = new WebSocketChangeTracker({
 *   databaseURL: 'https://db.example.com/app',
 *   authorizer: new BearerTokenAuthorizer('test-token'),
 * })
 * ```
 *
 * @module ws-change-tracker/auth/authorizer
 */

/**
 * The parts of the handshake request an authorizer may inspect.
 */
export interface AuthorizableRequest {
  /** HTTP method of the handshake, always `GET` */
  readonly method: string
  /** Feed URL the handshake is sent to */
  readonly url: URL
  /** Headers set so far */
  readonly headers: Readonly<Record<string, string>>
}

/**
 * Supplies the `Authorization` header of a handshake request.
 *
 * Implementations may be shared between trackers and must not mutate the request.
 */
export interface Authorizer {
  /**
   * Computes the header value for a request.
   *
   * @param request - The request being built
   * @param realm - Authentication realm, when the server named one
   * @returns The header value, or `undefined`/empty to send none
   */
  authorize(request: AuthorizableRequest, realm?: string): string | undefined
}

/**
 * Authorizer sending a fixed bearer token.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc6750
 */
export class BearerTokenAuthorizer implements Authorizer {
  private readonly token: string

  constructor(token: string) {
    if (!token) {
      throw new Error('Token cannot be empty')
    }
    this.token = token
  }

  authorize(): string {
    return `Bearer ${this.token}`
  }
}

/**
 * Authorizer sending HTTP Basic credentials.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc7617
 */
export class BasicAuthorizer implements Authorizer {
  private readonly encoded: string

  constructor(username: string, password: string) {
    if (username.includes(':')) {
      throw new Error('Username cannot contain a colon')
    }
    this.encoded = Buffer.from(`${username}:${password}`, 'utf8').toString('base64')
  }

  authorize(): string {
    return `Basic ${this.encoded}`
  }
}
