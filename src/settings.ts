import path from 'node:path'

import type { ExtractionConfig } from './config.js'
import {
  parseDurationMs,
  parseFrameFormat,
  parseHashAlgorithm,
  parseLanguageList,
  parseRetriesArg,
  parseStrategy,
  unsupported,
} from './flags.js'
import type { HashAlgorithm } from './slides/hash.js'
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './slides/retry.js'
import type { FrameFormat, RepresentativeStrategy } from './slides/types.js'
import { DEFAULT_YT_DLP_FORMAT } from './slides/yt-dlp.js'

export type ExtractionSettings = {
  outputDir: string
  intervalSeconds: number
  similarityThreshold: number
  strategy: RepresentativeStrategy
  hashAlgorithm: HashAlgorithm
  languages: string[]
  ocrConfidenceThreshold: number
  memoryThresholdMb: number
  memoryWarningFraction: number
  maxDurationSeconds: number
  maxCorruptFrames: number
  minFreeDiskMb: number
  frameFormat: FrameFormat
  workers: number
  retry: RetryPolicy
  frameTimeoutMs: number
  ocrTimeoutMs: number
  timeline: boolean
  cleanup: boolean
  ytDlpFormat: string
}

export type ExtractionFlags = {
  output?: string
  interval?: string
  threshold?: string
  strategy?: string
  hash?: string
  lang?: string
  ocrConfidence?: string
  memoryThreshold?: string
  maxDuration?: string
  maxCorruptFrames?: string
  minFreeDisk?: string
  frameFormat?: string
  workers?: string
  retries?: string
  timeout?: string
  /** Only `false` when `--no-timeline` was passed. */
  timeline?: boolean
  keepArtifacts?: boolean
}

/** Tesseract traineddata codes accepted for `--lang`. */
export const SUPPORTED_LANGUAGES: readonly string[] = [
  'eng',
  'spa',
  'fra',
  'deu',
  'jpn',
  'chi_sim',
  'chi_tra',
  'kor',
  'rus',
  'ara',
  'hin',
  'por',
  'ita',
  'nld',
  'pol',
  'tur',
]

export const DEFAULT_SETTINGS: Omit<ExtractionSettings, 'outputDir'> = {
  intervalSeconds: 5,
  similarityThreshold: 0.85,
  strategy: 'middle',
  hashAlgorithm: 'perceptual',
  languages: ['eng'],
  ocrConfidenceThreshold: 0.6,
  memoryThresholdMb: 500,
  memoryWarningFraction: 0.8,
  maxDurationSeconds: 4 * 60 * 60,
  maxCorruptFrames: 10,
  minFreeDiskMb: 500,
  frameFormat: 'jpg',
  workers: 8,
  retry: DEFAULT_RETRY_POLICY,
  frameTimeoutMs: 300_000,
  ocrTimeoutMs: 120_000,
  timeline: true,
  cleanup: true,
  ytDlpFormat: DEFAULT_YT_DLP_FORMAT,
}

const DEFAULT_OUTPUT_DIR = 'output'
const MIN_MEMORY_THRESHOLD_MB = 100

type Candidate = { raw: unknown; label: string }

/** First source that has a value wins; the label names that source in errors. */
function pick(...candidates: Array<Candidate | null>): Candidate | null {
  for (const candidate of candidates) {
    if (!candidate) continue
    if (typeof candidate.raw === 'undefined' || candidate.raw === null) continue
    if (typeof candidate.raw === 'string' && candidate.raw.trim() === '') continue
    return candidate
  }
  return null
}

const parseNumberInRange = (
  candidate: Candidate | null,
  { min, max }: { min: number; max: number }
): number | null => {
  if (!candidate) return null
  const { raw, label } = candidate
  const value = typeof raw === 'string' ? raw.trim() : raw
  const numeric = typeof value === 'number' ? value : Number(value)
  if (!Number.isFinite(numeric)) {
    throw unsupported(label, raw)
  }
  if (numeric < min || numeric > max) {
    throw unsupported(label, raw, `range ${min}-${max}`)
  }
  return numeric
}

const parseIntInRange = (
  candidate: Candidate | null,
  range: { min: number; max: number }
): number | null => {
  const numeric = parseNumberInRange(candidate, range)
  if (numeric === null || !candidate) return null
  if (!Number.isInteger(numeric)) throw unsupported(candidate.label, candidate.raw, 'integer')
  return numeric
}

const asString = (candidate: Candidate | null): { value: string; label: string } | null =>
  candidate ? { value: String(candidate.raw), label: candidate.label } : null

function resolveEnvWorkers(env: Record<string, string | undefined>): number | null {
  const raw = env.SLIDESCRIBE_WORKERS
  if (!raw) return null
  const parsed = Number(raw)
  if (!Number.isFinite(parsed) || parsed <= 0) return null
  return Math.max(1, Math.min(16, Math.round(parsed)))
}

function resolveLanguages(candidate: Candidate | null): string[] {
  if (!candidate) return DEFAULT_SETTINGS.languages
  const languages = Array.isArray(candidate.raw)
    ? candidate.raw.map((entry) => String(entry).trim().toLowerCase()).filter(Boolean)
    : parseLanguageList(String(candidate.raw))
  if (languages.length === 0) {
    throw unsupported(candidate.label, candidate.raw, 'at least one language is required')
  }
  const unknown = languages.filter((language) => !SUPPORTED_LANGUAGES.includes(language))
  if (unknown.length > 0) {
    throw unsupported(
      candidate.label,
      unknown.join(', '),
      `supported: ${SUPPORTED_LANGUAGES.join(', ')}`
    )
  }
  return Array.from(new Set(languages))
}

export function resolveExtractionSettings({
  flags,
  env,
  config,
  cwd,
}: {
  flags: ExtractionFlags
  env: Record<string, string | undefined>
  config: ExtractionConfig | null
  cwd: string
}): ExtractionSettings {
  const fromConfig = (key: keyof ExtractionConfig): Candidate | null =>
    config ? { raw: config[key], label: `extraction.${key}` } : null
  const fromFlag = (raw: string | undefined, label: string): Candidate | null =>
    typeof raw === 'string' ? { raw, label } : null

  const outputRaw = asString(
    pick(
      fromFlag(flags.output, '--output'),
      fromFlag(env.SLIDESCRIBE_OUTPUT_DIR, 'SLIDESCRIBE_OUTPUT_DIR'),
      fromConfig('outputDir')
    )
  )
  const outputDir = path.resolve(cwd, outputRaw?.value ?? DEFAULT_OUTPUT_DIR)

  const intervalSeconds =
    parseNumberInRange(pick(fromFlag(flags.interval, '--interval'), fromConfig('intervalSeconds')), {
      min: 0.1,
      max: 60,
    }) ?? DEFAULT_SETTINGS.intervalSeconds

  const similarityThreshold =
    parseNumberInRange(
      pick(fromFlag(flags.threshold, '--threshold'), fromConfig('similarityThreshold')),
      { min: 0, max: 1 }
    ) ?? DEFAULT_SETTINGS.similarityThreshold

  const strategyRaw = asString(pick(fromFlag(flags.strategy, '--strategy'), fromConfig('strategy')))
  const strategy = strategyRaw
    ? parseStrategy(strategyRaw.value, strategyRaw.label)
    : DEFAULT_SETTINGS.strategy

  const hashRaw = asString(pick(fromFlag(flags.hash, '--hash'), fromConfig('hashAlgorithm')))
  const hashAlgorithm = hashRaw
    ? parseHashAlgorithm(hashRaw.value, hashRaw.label)
    : DEFAULT_SETTINGS.hashAlgorithm

  const languages = resolveLanguages(pick(fromFlag(flags.lang, '--lang'), fromConfig('languages')))

  const ocrConfidenceThreshold =
    parseNumberInRange(
      pick(fromFlag(flags.ocrConfidence, '--ocr-confidence'), fromConfig('ocrConfidenceThreshold')),
      { min: 0, max: 1 }
    ) ?? DEFAULT_SETTINGS.ocrConfidenceThreshold

  const memoryThresholdMb =
    parseNumberInRange(
      pick(fromFlag(flags.memoryThreshold, '--memory-threshold'), fromConfig('memoryThresholdMb')),
      { min: MIN_MEMORY_THRESHOLD_MB, max: 1_048_576 }
    ) ?? DEFAULT_SETTINGS.memoryThresholdMb

  const memoryWarningFraction =
    parseNumberInRange(pick(fromConfig('memoryWarningFraction')), { min: 0, max: 1 }) ??
    DEFAULT_SETTINGS.memoryWarningFraction

  const maxDurationSeconds =
    typeof flags.maxDuration === 'string'
      ? parseDurationMs(flags.maxDuration, '--max-duration') / 1000
      : (parseNumberInRange(pick(fromConfig('maxDuration')), { min: 1, max: 7 * 24 * 3600 }) ??
        DEFAULT_SETTINGS.maxDurationSeconds)

  const maxCorruptFrames =
    parseIntInRange(
      pick(fromFlag(flags.maxCorruptFrames, '--max-corrupt-frames'), fromConfig('maxCorruptFrames')),
      { min: 0, max: 100_000 }
    ) ?? DEFAULT_SETTINGS.maxCorruptFrames

  const minFreeDiskMb =
    parseNumberInRange(
      pick(fromFlag(flags.minFreeDisk, '--min-free-disk'), fromConfig('minFreeDiskMb')),
      { min: 0, max: 1_048_576 }
    ) ?? DEFAULT_SETTINGS.minFreeDiskMb

  const frameFormatRaw = asString(
    pick(fromFlag(flags.frameFormat, '--frame-format'), fromConfig('frameFormat'))
  )
  const frameFormat = frameFormatRaw
    ? parseFrameFormat(frameFormatRaw.value, frameFormatRaw.label)
    : DEFAULT_SETTINGS.frameFormat

  const workers =
    parseIntInRange(pick(fromFlag(flags.workers, '--workers')), { min: 1, max: 16 }) ??
    resolveEnvWorkers(env) ??
    parseIntInRange(pick(fromConfig('workers')), { min: 1, max: 16 }) ??
    DEFAULT_SETTINGS.workers

  const maxRetries =
    typeof flags.retries === 'string'
      ? parseRetriesArg(flags.retries)
      : (parseIntInRange(pick(fromConfig('maxRetries')), { min: 0, max: 10 }) ??
        DEFAULT_SETTINGS.retry.maxRetries)

  const timeoutMs =
    typeof flags.timeout === 'string'
      ? parseDurationMs(flags.timeout, '--timeout')
      : (parseIntInRange(pick(fromConfig('timeoutMs')), { min: 1, max: 24 * 3_600_000 }) ??
        DEFAULT_SETTINGS.retry.timeoutMs)

  const timeline =
    flags.timeline === false ? false : (config?.timeline ?? DEFAULT_SETTINGS.timeline)
  const cleanup = flags.keepArtifacts ? false : (config?.cleanup ?? DEFAULT_SETTINGS.cleanup)

  return {
    outputDir,
    intervalSeconds,
    similarityThreshold,
    strategy,
    hashAlgorithm,
    languages,
    ocrConfidenceThreshold,
    memoryThresholdMb,
    memoryWarningFraction,
    maxDurationSeconds,
    maxCorruptFrames,
    minFreeDiskMb,
    frameFormat,
    workers,
    retry: { ...DEFAULT_SETTINGS.retry, maxRetries, timeoutMs },
    frameTimeoutMs: DEFAULT_SETTINGS.frameTimeoutMs,
    ocrTimeoutMs: DEFAULT_SETTINGS.ocrTimeoutMs,
    timeline,
    cleanup,
    ytDlpFormat: config?.ytDlpFormat ?? DEFAULT_SETTINGS.ytDlpFormat,
  }
}
