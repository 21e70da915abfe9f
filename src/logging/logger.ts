import { Logger } from 'tslog'

import type { SlidescribeConfig } from '../config.js'
import { createRingFileWriter, type RingFileWriter } from './ring-file.js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogFormat = 'json' | 'pretty'

export type AppLogger = Logger<Record<string, unknown>>

export type LoggingSettings = {
  level: LogLevel
  format: LogFormat
  file: { path: string; maxBytes: number; maxFiles: number } | null
}

const DEFAULT_LOG_LEVEL: LogLevel = 'warn'
const DEFAULT_LOG_FORMAT: LogFormat = 'pretty'
const DEFAULT_LOG_MAX_MB = 10
const DEFAULT_LOG_MAX_FILES = 3

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
}

export function parseLogLevel(raw: string, label: string): LogLevel {
  const normalized = raw.trim().toLowerCase()
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
  ) {
    return normalized
  }
  throw new Error(`Unsupported ${label}: ${raw}`)
}

export function parseLogFormat(raw: string, label: string): LogFormat {
  const normalized = raw.trim().toLowerCase()
  if (normalized === 'json' || normalized === 'pretty') return normalized
  throw new Error(`Unsupported ${label}: ${raw}`)
}

function safeJsonStringify(value: unknown): string {
  const seen = new WeakSet<object>()
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'bigint') return val.toString()
    if (val instanceof Error) {
      return {
        name: val.name,
        message: val.message,
        stack: val.stack,
        cause: val.cause,
      }
    }
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return val
  })
}

function formatPrettyLine({
  metaMarkup,
  args,
  errors,
}: {
  metaMarkup: string
  args: unknown[]
  errors: string[]
}): string {
  const parts: string[] = []
  const meta = metaMarkup.trim()
  if (meta) parts.push(meta)
  if (args.length > 0) {
    parts.push(
      args
        .map((arg) => (typeof arg === 'string' ? arg : safeJsonStringify(arg)))
        .join(' ')
    )
  }
  const base = parts.join(' ')
  if (errors.length === 0) return base
  const errorBlock = errors.join('\n')
  return base ? `${base}\n${errorBlock}` : errorBlock
}

/** Precedence: flags, then SLIDESCRIBE_LOG_LEVEL, then the config file. `--verbose` means info. */
export function resolveLoggingSettings({
  env,
  config,
  levelFlag,
  formatFlag,
  verbose,
}: {
  env: Record<string, string | undefined>
  config: SlidescribeConfig | null
  levelFlag: string | null
  formatFlag: string | null
  verbose: boolean
}): LoggingSettings {
  const logging = config?.logging
  const envLevel = env.SLIDESCRIBE_LOG_LEVEL?.trim()
  const level = levelFlag
    ? parseLogLevel(levelFlag, '--log-level')
    : envLevel
      ? parseLogLevel(envLevel, 'SLIDESCRIBE_LOG_LEVEL')
      : verbose
        ? 'info'
        : (logging?.level ?? DEFAULT_LOG_LEVEL)
  const format = formatFlag
    ? parseLogFormat(formatFlag, '--log-format')
    : (logging?.format ?? DEFAULT_LOG_FORMAT)

  const file =
    logging?.file && logging.enabled !== false
      ? {
          path: logging.file,
          maxBytes: Math.trunc((logging.maxMb ?? DEFAULT_LOG_MAX_MB) * 1024 * 1024),
          maxFiles: logging.maxFiles ?? DEFAULT_LOG_MAX_FILES,
        }
      : null

  return { level, format, file }
}

export function createAppLogger({
  settings,
  stderr,
  color = false,
}: {
  settings: LoggingSettings
  stderr: NodeJS.WritableStream
  color?: boolean
}): { logger: AppLogger; flush: () => Promise<void> } {
  const writer: RingFileWriter | null = settings.file
    ? createRingFileWriter({
        filePath: settings.file.path,
        maxBytes: settings.file.maxBytes,
        maxFiles: settings.file.maxFiles,
        onError: (error) => {
          const message = error instanceof Error ? error.message : String(error)
          stderr.write(`Failed to write log file ${settings.file?.path ?? ''}: ${message}\n`)
        },
      })
    : null

  const emit = (line: string) => {
    stderr.write(line.endsWith('\n') ? line : `${line}\n`)
    writer?.write(line)
  }

  const baseSettings = {
    name: 'slidescribe',
    minLevel: LOG_LEVEL_MAP[settings.level],
    hideLogPositionForProduction: true,
    metaProperty: '_meta',
    stylePrettyLogs: color,
  }

  const logger =
    settings.format === 'pretty'
      ? new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'pretty',
          prettyLogTemplate: '{{logLevelName}}\t[{{name}}]\t',
          overwrite: {
            transportFormatted: (metaMarkup, args, errors) => {
              emit(formatPrettyLine({ metaMarkup, args, errors }))
            },
          },
        })
      : new Logger<Record<string, unknown>>({
          ...baseSettings,
          type: 'json',
          overwrite: {
            transportJSON: (json) => {
              emit(safeJsonStringify(json))
            },
          },
        })

  const flush = async () => {
    if (writer) await writer.flush()
  }

  return { logger, flush }
}
