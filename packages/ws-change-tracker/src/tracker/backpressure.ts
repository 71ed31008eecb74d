/**
 * @file Backpressure Gate
 *
 * Counts messages that arrived on a socket but have not been processed yet.
 * Once the count reaches the limit the socket should stop delivering; it may
 * deliver again when the count drops below it.
 *
 * One gate belongs to one connection, so late messages from a superseded
 * socket release their own gate and never skew the current one.
 *
 * @module ws-change-tracker/tracker/backpressure
 */

/**
 * Default number of in-flight messages before the socket is paused.
 */
export const DEFAULT_MAX_PENDING_MESSAGES = 2

/**
 * Snapshot of a gate, for diagnostics.
 */
export interface BackpressureInfo {
  /** Messages received and not yet processed */
  pending: number
  /** Limit at which the socket is paused; 0 disables pausing */
  limit: number
  /** Whether the limit is reached */
  saturated: boolean
}

/**
 * In-flight message counter with a pause threshold.
 *
 * @example
 * ```typescript
 * const gate = new BackpressureGate(2)
 * gate.acquire() // 1 pending
 * gate.acquire() // 2 pending, saturated
 * gate.release() // 1 pending
 * ```
 */
export class BackpressureGate {
  private _pending = 0

  constructor(readonly limit: number = DEFAULT_MAX_PENDING_MESSAGES) {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`Backpressure limit must be a non-negative integer, got: ${limit}`)
    }
  }

  get pending(): number {
    return this._pending
  }

  /**
   * Whether the socket should stop delivering.
   */
  get saturated(): boolean {
    return this.limit > 0 && this._pending >= this.limit
  }

  get info(): BackpressureInfo {
    return { pending: this._pending, limit: this.limit, saturated: this.saturated }
  }

  /**
   * Records a received message.
   *
   * @returns Whether the gate is saturated afterwards
   */
  acquire(): boolean {
    this._pending++
    return this.saturated
  }

  /**
   * Records a processed message. Never goes below zero.
   */
  release(): void {
    if (this._pending > 0) {
      this._pending--
    }
  }
}
