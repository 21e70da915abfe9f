import { createExtractionError, type ExtractionError } from '../errors.js'

export type RetryPolicy = {
  maxRetries: number
  initialBackoffMs: number
  maxBackoffMs: number
  /** Per-attempt timeout for network-bound tool calls. */
  timeoutMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialBackoffMs: 1_000,
  maxBackoffMs: 30_000,
  timeoutMs: 300_000,
}

const JITTER_FRACTION = 0.1

/** `min(initial * 2^attempt, max)` plus up to 10% jitter: result is in `[delay, 1.1 * delay)`. */
export function computeBackoffMs(
  attempt: number,
  { initialMs, maxMs }: { initialMs: number; maxMs: number },
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, Math.trunc(attempt))
  const delay = Math.min(initialMs * 2 ** exponent, maxMs)
  const jitter = Math.min(Math.max(random(), 0), 0.999_999) * JITTER_FRACTION * delay
  return delay + jitter
}

export function shouldRetry(attempt: number, maxRetries: number): boolean {
  return attempt < maxRetries
}

export function createRetryExhaustedError(timeoutMs: number, cause?: unknown): ExtractionError {
  return createExtractionError({ kind: 'network-timeout', timeoutMs }, cause)
}
