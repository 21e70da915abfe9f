import { createExtractionError, type ExtractionError } from './errors.js'
import { HASH_ALGORITHMS, type HashAlgorithm } from './slides/hash.js'
import type { FrameFormat, RepresentativeStrategy } from './slides/types.js'

const DURATION_PATTERN = /^(?<value>\d+(?:\.\d+)?)(?<unit>ms|s|m|h)?$/i
const MIN_RETRIES = 0
const MAX_RETRIES = 10

export function unsupported(label: string, raw: unknown, hint?: string): ExtractionError {
  const suffix = hint ? ` (${hint})` : ''
  return createExtractionError({
    kind: 'invalid-config',
    detail: `Unsupported ${label}: ${String(raw)}${suffix}`,
  })
}

export function parseDurationMs(raw: string, label = '--timeout'): number {
  const normalized = raw.trim()
  const match = DURATION_PATTERN.exec(normalized)
  if (!match?.groups) {
    throw unsupported(label, raw)
  }

  const numeric = Number(match.groups.value)
  if (!Number.isFinite(numeric) || numeric <= 0) {
    throw unsupported(label, raw)
  }

  const unit = match.groups.unit?.toLowerCase() ?? 's'
  const multiplier = unit === 'ms' ? 1 : unit === 's' ? 1000 : unit === 'm' ? 60_000 : 3_600_000
  return Math.floor(numeric * multiplier)
}

export function parseRetriesArg(raw: string): number {
  const normalized = raw.trim()
  if (!normalized) {
    throw unsupported('--retries', raw)
  }
  const numeric = Number(normalized)
  if (!Number.isFinite(numeric) || !Number.isInteger(numeric)) {
    throw unsupported('--retries', raw)
  }
  if (numeric < MIN_RETRIES || numeric > MAX_RETRIES) {
    throw unsupported('--retries', raw, `range ${MIN_RETRIES}-${MAX_RETRIES}`)
  }
  return numeric
}

export function parseStrategy(raw: string, label = '--strategy'): RepresentativeStrategy {
  const normalized = raw.trim().toLowerCase()
  if (normalized === 'first' || normalized === 'middle' || normalized === 'last') {
    return normalized
  }
  throw unsupported(label, raw, 'first, middle, last')
}

export function parseHashAlgorithm(raw: string, label = '--hash'): HashAlgorithm {
  const normalized = raw.trim().toLowerCase()
  const match = HASH_ALGORITHMS.find((algorithm) => algorithm === normalized)
  if (match) return match
  if (normalized === 'ahash') return 'average'
  if (normalized === 'dhash') return 'difference'
  if (normalized === 'phash') return 'perceptual'
  throw unsupported(label, raw, HASH_ALGORITHMS.join(', '))
}

export function parseFrameFormat(raw: string, label = '--frame-format'): FrameFormat {
  const normalized = raw.trim().toLowerCase()
  if (normalized === 'jpg' || normalized === 'jpeg') return 'jpg'
  if (normalized === 'png') return 'png'
  throw unsupported(label, raw, 'jpg, png')
}

/** Accepts `eng,deu`, `eng+deu` or `eng deu`. */
export function parseLanguageList(raw: string): string[] {
  return raw
    .split(/[\s,+]+/)
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean)
}
