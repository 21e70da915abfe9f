import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import JSON5 from 'json5'

import type { LogFormat, LogLevel } from './logging/logger.js'

export type ExtractionConfig = {
  outputDir?: string
  intervalSeconds?: number
  similarityThreshold?: number
  strategy?: string
  hashAlgorithm?: string
  languages?: string[]
  ocrConfidenceThreshold?: number
  memoryThresholdMb?: number
  memoryWarningFraction?: number
  /** Seconds. */
  maxDuration?: number
  maxCorruptFrames?: number
  minFreeDiskMb?: number
  frameFormat?: string
  workers?: number
  maxRetries?: number
  /** Milliseconds per network-bound tool call. */
  timeoutMs?: number
  timeline?: boolean
  cleanup?: boolean
  ytDlpFormat?: string
}

export type LoggingConfig = {
  enabled?: boolean
  level?: LogLevel
  format?: LogFormat
  file?: string
  maxMb?: number
  maxFiles?: number
}

export type SlidescribeConfig = {
  extraction?: ExtractionConfig
  logging?: LoggingConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

type FieldReader = {
  number: (key: string) => number | undefined
  string: (key: string) => string | undefined
  boolean: (key: string) => boolean | undefined
  stringArray: (key: string) => string[] | undefined
}

function createFieldReader(
  value: Record<string, unknown>,
  { path, section }: { path: string; section: string }
): FieldReader {
  const invalid = (key: string, expected: string) =>
    new Error(`Invalid config file ${path}: "${section}.${key}" must be ${expected}.`)

  return {
    number: (key) => {
      const raw = value[key]
      if (typeof raw === 'undefined') return undefined
      if (typeof raw !== 'number' || !Number.isFinite(raw)) throw invalid(key, 'a number')
      return raw
    },
    string: (key) => {
      const raw = value[key]
      if (typeof raw === 'undefined') return undefined
      if (typeof raw !== 'string') throw invalid(key, 'a string')
      const trimmed = raw.trim()
      return trimmed.length > 0 ? trimmed : undefined
    },
    boolean: (key) => {
      const raw = value[key]
      if (typeof raw === 'undefined') return undefined
      if (typeof raw !== 'boolean') throw invalid(key, 'a boolean')
      return raw
    },
    stringArray: (key) => {
      const raw = value[key]
      if (typeof raw === 'undefined') return undefined
      if (!Array.isArray(raw)) throw invalid(key, 'an array of strings')
      const items: string[] = []
      for (const entry of raw) {
        if (typeof entry !== 'string') throw invalid(key, 'an array of strings')
        const trimmed = entry.trim()
        if (trimmed) items.push(trimmed)
      }
      return items
    },
  }
}

function hasAnyValue(value: Record<string, unknown>): boolean {
  return Object.values(value).some((entry) => typeof entry !== 'undefined')
}

function parseExtractionConfig(raw: unknown, path: string): ExtractionConfig | undefined {
  if (typeof raw === 'undefined') return undefined
  if (!isRecord(raw)) {
    throw new Error(`Invalid config file ${path}: "extraction" must be an object.`)
  }
  const read = createFieldReader(raw, { path, section: 'extraction' })
  const extraction: ExtractionConfig = {
    outputDir: read.string('outputDir'),
    intervalSeconds: read.number('intervalSeconds'),
    similarityThreshold: read.number('similarityThreshold'),
    strategy: read.string('strategy'),
    hashAlgorithm: read.string('hashAlgorithm'),
    languages: read.stringArray('languages'),
    ocrConfidenceThreshold: read.number('ocrConfidenceThreshold'),
    memoryThresholdMb: read.number('memoryThresholdMb'),
    memoryWarningFraction: read.number('memoryWarningFraction'),
    maxDuration: read.number('maxDuration'),
    maxCorruptFrames: read.number('maxCorruptFrames'),
    minFreeDiskMb: read.number('minFreeDiskMb'),
    frameFormat: read.string('frameFormat'),
    workers: read.number('workers'),
    maxRetries: read.number('maxRetries'),
    timeoutMs: read.number('timeoutMs'),
    timeline: read.boolean('timeline'),
    cleanup: read.boolean('cleanup'),
    ytDlpFormat: read.string('ytDlpFormat'),
  }
  return hasAnyValue(extraction) ? extraction : undefined
}

function parseLoggingLevel(raw: string | undefined, path: string): LogLevel | undefined {
  if (typeof raw === 'undefined') return undefined
  const trimmed = raw.toLowerCase()
  if (trimmed === 'debug' || trimmed === 'info' || trimmed === 'warn' || trimmed === 'error') {
    return trimmed
  }
  throw new Error(
    `Invalid config file ${path}: "logging.level" must be one of "debug", "info", "warn", "error".`
  )
}

function parseLoggingFormat(raw: string | undefined, path: string): LogFormat | undefined {
  if (typeof raw === 'undefined') return undefined
  const trimmed = raw.toLowerCase()
  if (trimmed === 'json' || trimmed === 'pretty') return trimmed
  throw new Error(
    `Invalid config file ${path}: "logging.format" must be one of "json" or "pretty".`
  )
}

function parseLoggingConfig(raw: unknown, path: string): LoggingConfig | undefined {
  if (typeof raw === 'undefined') return undefined
  if (!isRecord(raw)) {
    throw new Error(`Invalid config file ${path}: "logging" must be an object.`)
  }
  const read = createFieldReader(raw, { path, section: 'logging' })
  const level = parseLoggingLevel(read.string('level'), path)
  const format = parseLoggingFormat(read.string('format'), path)
  const maxMb = read.number('maxMb')
  if (typeof maxMb === 'number' && maxMb <= 0) {
    throw new Error(`Invalid config file ${path}: "logging.maxMb" must be positive.`)
  }
  const maxFiles = read.number('maxFiles')
  if (typeof maxFiles === 'number' && maxFiles < 1) {
    throw new Error(`Invalid config file ${path}: "logging.maxFiles" must be at least 1.`)
  }
  const logging: LoggingConfig = {
    enabled: read.boolean('enabled'),
    level,
    format,
    file: read.string('file'),
    maxMb,
    maxFiles: typeof maxFiles === 'number' ? Math.trunc(maxFiles) : undefined,
  }
  return hasAnyValue(logging) ? logging : undefined
}

export function resolveConfigPath(env: Record<string, string | undefined>): string | null {
  const explicit = env.SLIDESCRIBE_CONFIG?.trim()
  if (explicit) return explicit
  const home = env.HOME?.trim() || env.USERPROFILE?.trim() || null
  if (!home) return null
  return join(home, '.slidescribe', 'config.json')
}

export function loadSlidescribeConfig({ env }: { env: Record<string, string | undefined> }): {
  config: SlidescribeConfig | null
  path: string | null
} {
  const path = resolveConfigPath(env)
  if (!path) return { config: null, path: null }

  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch {
    return { config: null, path }
  }

  let parsed: unknown
  try {
    parsed = JSON5.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid JSON in config file ${path}: ${message}`)
  }

  if (!isRecord(parsed)) {
    throw new Error(`Invalid config file ${path}: expected an object at the top level`)
  }

  const extraction = parseExtractionConfig(parsed.extraction, path)
  const logging = parseLoggingConfig(parsed.logging, path)

  return {
    config: {
      ...(extraction ? { extraction } : {}),
      ...(logging ? { logging } : {}),
    },
    path,
  }
}
