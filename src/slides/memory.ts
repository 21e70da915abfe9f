import { createExtractionError, fail, type Outcome, succeed } from '../errors.js'

const BYTES_PER_MB = 1024 * 1024

export type MemoryUsage = {
  currentBytes: number
  peakBytes: number
  thresholdBytes: number
}

export type MemoryGuard = {
  record: (bytesInUse: number) => void
  usage: () => MemoryUsage
  exceedsThreshold: () => boolean
  approachingThreshold: (warningFraction?: number) => boolean
  validate: () => Outcome<MemoryUsage>
  checkAndWarn: (logger: { warn: (...args: unknown[]) => unknown } | null) => boolean
}

export const toMb = (bytes: number) => Math.round(bytes / BYTES_PER_MB)

export function createMemoryGuard({
  thresholdMb,
  warningFraction,
  readRss = () => process.memoryUsage.rss(),
}: {
  thresholdMb: number
  warningFraction: number
  readRss?: () => number
}): MemoryGuard {
  const thresholdBytes = Math.trunc(thresholdMb * BYTES_PER_MB)
  let peakBytes = 0

  const record = (bytesInUse: number) => {
    if (bytesInUse > peakBytes) peakBytes = bytesInUse
  }

  // Current usage is always sampled live; every sample also feeds the peak.
  const sample = () => {
    const current = readRss()
    record(current)
    return current
  }

  const usage = (): MemoryUsage => {
    const currentBytes = sample()
    return { currentBytes, peakBytes, thresholdBytes }
  }

  const exceedsThreshold = () => sample() > thresholdBytes

  const approachingThreshold = (fraction = warningFraction) =>
    sample() > thresholdBytes * fraction

  const validate = (): Outcome<MemoryUsage> => {
    const snapshot = usage()
    if (snapshot.currentBytes > thresholdBytes) {
      return fail(
        createExtractionError({
          kind: 'memory-threshold-exceeded',
          usedMb: toMb(snapshot.currentBytes),
          thresholdMb: toMb(thresholdBytes),
        })
      )
    }
    return succeed(snapshot)
  }

  const checkAndWarn = (logger: { warn: (...args: unknown[]) => unknown } | null) => {
    const snapshot = usage()
    const approaching = snapshot.currentBytes > thresholdBytes * warningFraction
    if (approaching) {
      logger?.warn(
        `memory usage ${toMb(snapshot.currentBytes)}MB is approaching the ${toMb(thresholdBytes)}MB limit`
      )
    }
    return approaching
  }

  return { record, usage, exceedsThreshold, approachingThreshold, validate, checkAndWarn }
}
