import { describe, expect, it } from 'vitest'

import { isRetryable } from '../src/errors.js'
import { computeBackoffMs, createRetryExhaustedError, shouldRetry } from '../src/slides/retry.js'

const backoff = { initialMs: 1000, maxMs: 30_000 }

describe('computeBackoffMs', () => {
  it('doubles the delay per attempt', () => {
    expect(computeBackoffMs(0, backoff, () => 0)).toBe(1000)
    expect(computeBackoffMs(1, backoff, () => 0)).toBe(2000)
    expect(computeBackoffMs(3, backoff, () => 0)).toBe(8000)
  })

  it('caps the delay at the maximum', () => {
    expect(computeBackoffMs(10, backoff, () => 0)).toBe(30_000)
    const capped = computeBackoffMs(10, { initialMs: 10_000, maxMs: 20_000 })
    expect(capped).toBeGreaterThanOrEqual(20_000)
    expect(capped).toBeLessThan(22_000)
  })

  it('adds up to 10% jitter', () => {
    expect(computeBackoffMs(0, backoff, () => 0.5)).toBe(1050)
    const highest = computeBackoffMs(0, backoff, () => 1)
    expect(highest).toBeGreaterThanOrEqual(1000)
    expect(highest).toBeLessThan(1100)
  })

  it('stays within [delay, 1.1 * delay) for random jitter', () => {
    for (let attempt = 0; attempt < 8; attempt += 1) {
      const delay = Math.min(1000 * 2 ** attempt, 30_000)
      const value = computeBackoffMs(attempt, backoff)
      expect(value).toBeGreaterThanOrEqual(delay)
      expect(value).toBeLessThan(delay * 1.1)
    }
  })
})

describe('shouldRetry', () => {
  it('allows attempts below the maximum', () => {
    expect(shouldRetry(0, 3)).toBe(true)
    expect(shouldRetry(2, 3)).toBe(true)
    expect(shouldRetry(3, 3)).toBe(false)
    expect(shouldRetry(0, 0)).toBe(false)
  })
})

describe('createRetryExhaustedError', () => {
  it('is a network timeout carrying the timeout', () => {
    const error = createRetryExhaustedError(30_000)
    expect(error.failure).toEqual({ kind: 'network-timeout', timeoutMs: 30_000 })
    expect(error.message).toBe('Network timeout after 30s')
    expect(error.category).toBe('network')
    expect(isRetryable(error)).toBe(true)
  })
})
