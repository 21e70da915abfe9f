import { CommanderError } from 'commander'

import { loadSlidescribeConfig, type SlidescribeConfig } from './config.js'
import { createExtractionError, isExtractionError } from './errors.js'
import { type AppLogger, createAppLogger, resolveLoggingSettings } from './logging/logger.js'
import { attachRichHelp, buildProgram } from './run/help.js'
import { type ExtractionFlags, type ExtractionSettings, resolveExtractionSettings } from './settings.js'
import { createFfmpegFrameSampler, createFfmpegGrayscaleSampler, createFfprobe } from './slides/ffmpeg.js'
import { createHashEngine } from './slides/hash.js'
import { type ExtractionResult, type PipelineCollaborators, runExtraction } from './slides/pipeline.js'
import { createUrlValidator, toSlug } from './slides/source.js'
import { createTesseractRecognizer } from './slides/tesseract.js'
import { checkDependencies, createDependencyMissingError, createToolResolver } from './slides/tools.js'
import { createYtDlpSource } from './slides/yt-dlp.js'
import { createProgressSink, supportsColor } from './tty/progress.js'
import { resolvePackageVersion } from './version.js'

export type CollaboratorFactory = (context: {
  settings: ExtractionSettings
  env: Record<string, string | undefined>
  logger: AppLogger
}) => PipelineCollaborators

export type RunCliOptions = {
  env: Record<string, string | undefined>
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  cwd?: string
  createCollaborators?: CollaboratorFactory
  sleep?: (ms: number) => Promise<void>
}

export const createDefaultCollaborators: CollaboratorFactory = ({ settings, env, logger }) => {
  const resolveTool = createToolResolver(env)
  const probeVideo = createFfprobe({
    resolveTool,
    onError: (message) => {
      logger.warn(message)
    },
  })
  return {
    videoSource: createYtDlpSource({ resolveTool, probeVideo, format: settings.ytDlpFormat }),
    frameSampler: createFfmpegFrameSampler({ resolveTool }),
    textRecognizer: createTesseractRecognizer({ resolveTool }),
    hashEngine: createHashEngine({
      sampler: createFfmpegGrayscaleSampler({ resolveTool }),
      algorithm: settings.hashAlgorithm,
    }),
  }
}

const readString = (opts: Record<string, unknown>, key: string): string | undefined => {
  const value = opts[key]
  return typeof value === 'string' ? value : undefined
}

function readExtractionFlags(opts: Record<string, unknown>): ExtractionFlags {
  return {
    output: readString(opts, 'output'),
    interval: readString(opts, 'interval'),
    threshold: readString(opts, 'threshold'),
    strategy: readString(opts, 'strategy'),
    hash: readString(opts, 'hash'),
    lang: readString(opts, 'lang'),
    ocrConfidence: readString(opts, 'ocrConfidence'),
    memoryThreshold: readString(opts, 'memoryThreshold'),
    maxDuration: readString(opts, 'maxDuration'),
    maxCorruptFrames: readString(opts, 'maxCorruptFrames'),
    minFreeDisk: readString(opts, 'minFreeDisk'),
    frameFormat: readString(opts, 'frameFormat'),
    workers: readString(opts, 'workers'),
    retries: readString(opts, 'retries'),
    timeout: readString(opts, 'timeout'),
    timeline: opts.timeline === false ? false : undefined,
    keepArtifacts: opts.keepArtifacts === true,
  }
}

function loadConfig(env: Record<string, string | undefined>): SlidescribeConfig | null {
  try {
    return loadSlidescribeConfig({ env }).config
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error)
    throw createExtractionError({ kind: 'invalid-config', detail }, error)
  }
}

function writeDependencyReport(
  env: Record<string, string | undefined>,
  stdout: NodeJS.WritableStream
): void {
  const statuses = checkDependencies(env)
  for (const status of statuses) {
    const state = status.path ? `ok (${status.path})` : 'missing'
    stdout.write(`${status.displayName.padEnd(14)} ${state}\n`)
  }
  const missing = statuses.find((status) => !status.path)
  if (missing) throw createDependencyMissingError(missing.tool)
}

export function formatCliError(error: unknown): string {
  // commander already printed its own message through configureOutput.
  if (error instanceof CommanderError) return ''
  if (isExtractionError(error)) {
    return `Error: ${error.message}\n\n${error.userMessage}\n`
  }
  const message = error instanceof Error ? error.message : String(error)
  return `Error: ${message}\n`
}

/**
 * Parses argv, resolves settings and runs one extraction. Throws on any failure;
 * mapping errors to exit codes is left to the entrypoint.
 */
export async function runCli(
  argv: string[],
  { env, stdout, stderr, cwd = process.cwd(), createCollaborators, sleep }: RunCliOptions
): Promise<ExtractionResult | null> {
  const program = buildProgram()
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  program.exitOverride()
  attachRichHelp(program, env, stdout)

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
      return null
    }
    throw error
  }

  const opts: Record<string, unknown> = program.opts()
  if (opts.version === true) {
    stdout.write(`${resolvePackageVersion()}\n`)
    return null
  }

  if (opts.checkDeps === true) {
    writeDependencyReport(env, stdout)
    return null
  }

  const rawUrl = program.args[0]
  if (!rawUrl) {
    throw new Error('Missing <url>. Run `slidescribe --help` for usage.')
  }

  const config = loadConfig(env)
  const loggingSettings = resolveLoggingSettings({
    env,
    config,
    levelFlag: readString(opts, 'logLevel') ?? null,
    formatFlag: readString(opts, 'logFormat') ?? null,
    verbose: opts.verbose === true,
  })
  const { logger, flush } = createAppLogger({
    settings: loggingSettings,
    stderr,
    color: supportsColor(stderr, env),
  })

  const validator = createUrlValidator()
  const located = validator.validate(rawUrl)
  if (!located.ok) throw located.error
  const locator = located.value

  const sessionRaw = readString(opts, 'session')
  const sessionId = sessionRaw === undefined ? locator.sourceId : toSlug(sessionRaw)
  if (!sessionId) {
    throw createExtractionError({
      kind: 'invalid-config',
      detail: `Unsupported --session: ${sessionRaw ?? ''} (letters, digits, "-" and "_")`,
    })
  }

  const settings = resolveExtractionSettings({
    flags: readExtractionFlags(opts),
    env,
    config: config?.extraction ?? null,
    cwd,
  })
  logger.debug(`settings: ${JSON.stringify(settings)}`)

  const collaborators = (createCollaborators ?? createDefaultCollaborators)({
    settings,
    env,
    logger,
  })
  const progress = createProgressSink({ stream: stderr, enabled: opts.progress !== false })

  try {
    const result = await runExtraction({
      locator,
      sessionId,
      settings,
      collaborators,
      logger,
      onProgress: progress.update,
      fresh: opts.fresh === true,
      ...(sleep ? { sleep } : {}),
    })
    progress.done()
    const verb = result.executedStages.length === 0 ? 'Already complete' : 'Wrote'
    stdout.write(`${verb}: ${result.reportPath} (${result.slideCount} slides)\n`)
    return result
  } catch (error) {
    progress.done()
    if (isExtractionError(error)) {
      logger.debug(`failed with ${error.kind} (${error.category})`)
    }
    throw error
  } finally {
    await flush()
  }
}
