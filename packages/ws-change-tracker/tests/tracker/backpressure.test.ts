/**
 * @file Backpressure Gate Tests
 */

import { describe, it, expect } from 'vitest'
import { BackpressureGate, DEFAULT_MAX_PENDING_MESSAGES } from '../../src/tracker/backpressure'

describe('BackpressureGate', () => {
  it('should default to two pending messages', () => {
    const gate = new BackpressureGate()

    expect(DEFAULT_MAX_PENDING_MESSAGES).toBe(2)
    expect(gate.limit).toBe(2)
  })

  it('should saturate when pending reaches the limit', () => {
    const gate = new BackpressureGate(2)

    expect(gate.acquire()).toBe(false)
    expect(gate.acquire()).toBe(true)
    expect(gate.info).toEqual({ pending: 2, limit: 2, saturated: true })
  })

  it('should unsaturate when a message is released', () => {
    const gate = new BackpressureGate(2)
    gate.acquire()
    gate.acquire()

    gate.release()

    expect(gate.pending).toBe(1)
    expect(gate.saturated).toBe(false)
  })

  it('should return to zero after matched acquire and release', () => {
    const gate = new BackpressureGate(3)
    for (let i = 0; i < 5; i++) gate.acquire()
    for (let i = 0; i < 5; i++) gate.release()

    expect(gate.pending).toBe(0)
  })

  it('should never go below zero', () => {
    const gate = new BackpressureGate(2)

    gate.release()

    expect(gate.pending).toBe(0)
  })

  it('should never saturate with a limit of zero', () => {
    const gate = new BackpressureGate(0)
    for (let i = 0; i < 100; i++) {
      expect(gate.acquire()).toBe(false)
    }
    expect(gate.pending).toBe(100)
  })

  it('should reject negative or fractional limits', () => {
    expect(() => new BackpressureGate(-1)).toThrow(RangeError)
    expect(() => new BackpressureGate(1.5)).toThrow('Backpressure limit must be a non-negative integer, got: 1.5')
  })
})
