import { promises as fs } from 'node:fs'
import path from 'node:path'

import {
  createExtractionError,
  type ExtractionError,
  isRetryable,
  type Outcome,
  toExtractionError,
} from '../errors.js'
import type { AppLogger } from '../logging/logger.js'
import type { ExtractionSettings } from '../settings.js'
import { createStageProgressReporter } from '../tty/progress.js'
import {
  advance,
  CHECKPOINT_FILE,
  type Checkpoint,
  type CheckpointPatch,
  createCheckpoint,
  hasReached,
  loadCheckpoint,
  nextStage,
  type PipelineStage,
  recordFailure,
  saveCheckpoint,
  STAGE_TARGET,
} from './checkpoint.js'
import { groupFrames } from './dedup.js'
import { expectedFrameCount, frameTimestamp } from './ffmpeg.js'
import type { HashEngine } from './hash.js'
import { createMemoryGuard, type MemoryGuard } from './memory.js'
import { writeReport } from './report.js'
import { computeBackoffMs, createRetryExhaustedError, shouldRetry } from './retry.js'
import type { VideoLocator } from './source.js'
import {
  isMediaFile,
  listImageFiles,
  readFreeDiskMb,
  resetDir,
  resolveSessionPaths,
  type SessionPaths,
  slideFileName,
} from './store.js'
import type {
  FetchedMetadata,
  FrameRecord,
  FrameSampler,
  SlideManifestEntry,
  SlideRecord,
  TextRecognizer,
  VideoMetadata,
  VideoSource,
} from './types.js'

export type PipelineCollaborators = {
  videoSource: VideoSource
  frameSampler: FrameSampler
  textRecognizer: TextRecognizer
  hashEngine: HashEngine
}

export type RunExtractionArgs = {
  locator: VideoLocator
  sessionId: string
  settings: ExtractionSettings
  collaborators: PipelineCollaborators
  logger?: AppLogger | null
  onProgress?: ((text: string) => void) | null
  /** Discard any existing checkpoint and intermediate files first. */
  fresh?: boolean
  sleep?: (ms: number) => Promise<void>
  now?: () => Date
  random?: () => number
  memoryGuard?: MemoryGuard
  freeDiskMb?: (dir: string) => Promise<number | null>
}

export type ExtractionResult = {
  sessionId: string
  sessionDir: string
  reportPath: string
  checkpoint: Checkpoint
  slideCount: number
  /** Stages that ran in this invocation; empty when the session was already complete. */
  executedStages: PipelineStage[]
}

type StageLogger = Pick<AppLogger, 'debug' | 'info' | 'warn' | 'error'>

const RESTRICTED_AVAILABILITY = new Set(['needs_auth', 'subscriber_only', 'premium_only'])
const ADULT_AGE_LIMIT = 18

// Overall progress share per stage: [start, end].
const STAGE_PROGRESS: Record<PipelineStage, [number, number]> = {
  'fetch-metadata': [0, 5],
  'download-video': [5, 40],
  'extract-frames': [40, 60],
  'identify-slides': [60, 80],
  'generate-report': [80, 100],
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms)
  })

export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number,
  onProgress?: ((completed: number, total: number) => void) | null
): Promise<T[]> {
  if (tasks.length === 0) return []
  const concurrency = Math.max(1, Math.min(16, Math.round(workers)))
  const results: T[] = new Array(tasks.length)
  const total = tasks.length
  let completed = 0
  let nextIndex = 0

  const worker = async () => {
    while (true) {
      const current = nextIndex
      if (current >= tasks.length) return
      nextIndex += 1
      const task = tasks[current]
      if (!task) continue
      try {
        results[current] = await task()
      } finally {
        completed += 1
        onProgress?.(completed, total)
      }
    }
  }

  const runners = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker())
  await Promise.all(runners)
  return results
}

/** Rejects restricted content and over-long videos before anything is downloaded. */
export function assertVideoAllowed(
  fetched: FetchedMetadata,
  { maxDurationSeconds }: { maxDurationSeconds: number }
): void {
  if (fetched.availability === 'private') {
    throw createExtractionError({ kind: 'video-private' })
  }
  if (
    (fetched.ageLimit !== null && fetched.ageLimit >= ADULT_AGE_LIMIT) ||
    (fetched.availability !== null && RESTRICTED_AVAILABILITY.has(fetched.availability))
  ) {
    throw createExtractionError({ kind: 'video-age-restricted' })
  }
  const duration = fetched.metadata.durationSeconds
  if (duration > maxDurationSeconds) {
    throw createExtractionError({
      kind: 'video-too-long',
      durationSeconds: Math.round(duration),
      maxSeconds: Math.round(maxDurationSeconds),
    })
  }
}

function missingField(checkpoint: Checkpoint, field: string): ExtractionError {
  return createExtractionError({
    kind: 'internal',
    detail: `session ${checkpoint.sessionId} is at ${checkpoint.status} but has no ${field}; rerun with --fresh`,
  })
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

async function ensureSessionDir(sessionDir: string): Promise<void> {
  try {
    await fs.mkdir(sessionDir, { recursive: true })
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'EACCES' || error.code === 'EPERM')) {
      throw createExtractionError({ kind: 'permission-denied', resource: sessionDir }, error)
    }
    throw toExtractionError(error)
  }
}

async function discardSession(paths: SessionPaths, sessionId: string): Promise<void> {
  await fs.rm(paths.checkpointPath, { force: true })
  await fs.rm(paths.framesDir, { recursive: true, force: true })
  await fs.rm(paths.slidesDir, { recursive: true, force: true })
  const entries = await fs.readdir(paths.sessionDir)
  for (const entry of entries) {
    if (entry === CHECKPOINT_FILE || !entry.startsWith(`${sessionId}.`)) continue
    if (!isMediaFile(entry, 'video') && !entry.endsWith('.part')) continue
    await fs.rm(path.join(paths.sessionDir, entry), { force: true })
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

export async function runExtraction({
  locator,
  sessionId,
  settings,
  collaborators,
  logger = null,
  onProgress = null,
  fresh = false,
  sleep = defaultSleep,
  now = () => new Date(),
  random = Math.random,
  memoryGuard,
  freeDiskMb = readFreeDiskMb,
}: RunExtractionArgs): Promise<ExtractionResult> {
  const log: StageLogger | null = logger ? logger.getSubLogger({ name: 'pipeline' }) : null
  const guard =
    memoryGuard ??
    createMemoryGuard({
      thresholdMb: settings.memoryThresholdMb,
      warningFraction: settings.memoryWarningFraction,
    })
  const report = createStageProgressReporter(onProgress)
  const paths = resolveSessionPaths(settings.outputDir, sessionId)
  const { retry } = settings

  const progressIn = (stage: PipelineStage, label: string) => {
    const [start, end] = STAGE_PROGRESS[stage]
    return (fraction: number, detail?: string) => {
      const clamped = Math.min(1, Math.max(0, fraction))
      report(label, start + (end - start) * clamped, detail)
    }
  }

  const withRetry = async <T>(
    label: string,
    operation: () => Promise<Outcome<T>>
  ): Promise<T> => {
    for (let attempt = 0; ; attempt += 1) {
      const outcome = await operation()
      if (outcome.ok) return outcome.value
      if (!isRetryable(outcome.error)) throw outcome.error
      if (!shouldRetry(attempt, retry.maxRetries)) {
        throw createRetryExhaustedError(retry.timeoutMs, outcome.error)
      }
      const delayMs = computeBackoffMs(
        attempt,
        { initialMs: retry.initialBackoffMs, maxMs: retry.maxBackoffMs },
        random
      )
      log?.warn(
        `${label} timed out (attempt ${attempt + 1} of ${retry.maxRetries + 1}); retrying in ${Math.round(delayMs)}ms`
      )
      await sleep(delayMs)
    }
  }

  const fetchMetadata = async (): Promise<CheckpointPatch> => {
    const progress = progressIn('fetch-metadata', 'fetching metadata')
    progress(0)
    const fetched = await withRetry('metadata request', () =>
      collaborators.videoSource.fetchMetadata({
        url: locator.canonicalUrl,
        videoId: locator.videoId,
        timeoutMs: retry.timeoutMs,
      })
    )
    assertVideoAllowed(fetched, { maxDurationSeconds: settings.maxDurationSeconds })
    log?.info(
      `metadata: "${fetched.metadata.title}" (${Math.round(fetched.metadata.durationSeconds)}s)`
    )
    progress(1)
    return { videoMetadata: fetched.metadata }
  }

  const downloadVideo = async (checkpoint: Checkpoint): Promise<CheckpointPatch> => {
    const metadata = checkpoint.videoMetadata
    if (!metadata) throw missingField(checkpoint, 'video metadata')
    const progress = progressIn('download-video', 'downloading')
    progress(0)

    const availableMb = await freeDiskMb(paths.sessionDir)
    if (availableMb !== null && availableMb < settings.minFreeDiskMb) {
      throw createExtractionError({
        kind: 'insufficient-disk-space',
        requiredMb: settings.minFreeDiskMb,
        availableMb,
      })
    }

    const downloaded = await withRetry('download', () =>
      collaborators.videoSource.download({
        url: locator.canonicalUrl,
        destinationDir: paths.sessionDir,
        baseName: sessionId,
        timeoutMs: retry.timeoutMs,
        onProgress: (percent, detail) => progress(percent / 100, detail),
      })
    )
    const { probe } = downloaded
    const merged: VideoMetadata = {
      ...metadata,
      durationSeconds:
        probe.durationSeconds !== null && probe.durationSeconds > 0
          ? probe.durationSeconds
          : metadata.durationSeconds,
      width: probe.width ?? metadata.width,
      height: probe.height ?? metadata.height,
    }
    log?.info(`downloaded ${path.basename(downloaded.filePath)}`)
    progress(1)
    return { videoPath: downloaded.filePath, videoMetadata: merged }
  }

  const extractFrames = async (checkpoint: Checkpoint): Promise<CheckpointPatch> => {
    const { videoPath, videoMetadata } = checkpoint
    if (!videoPath) throw missingField(checkpoint, 'video path')
    if (!videoMetadata) throw missingField(checkpoint, 'video metadata')
    if (!(await pathExists(videoPath))) {
      throw createExtractionError({
        kind: 'frame-extraction-failed',
        reason: `video file ${videoPath} is missing; rerun with --fresh`,
      })
    }
    const progress = progressIn('extract-frames', 'extracting frames')
    progress(0)

    const memory = guard.validate()
    if (!memory.ok) throw memory.error

    await resetDir(paths.framesDir)
    const durationSeconds = videoMetadata.durationSeconds
    const extracted = await collaborators.frameSampler.extractFrames({
      videoPath,
      outputDir: paths.framesDir,
      intervalSeconds: settings.intervalSeconds,
      format: settings.frameFormat,
      durationSeconds,
      timeoutMs: Math.max(settings.frameTimeoutMs, Math.ceil(durationSeconds * 1000)),
      onProgress: (percent) => progress(percent / 100),
    })
    if (!extracted.ok) throw extracted.error

    const { frameCount } = extracted.value
    if (frameCount === 0) {
      throw createExtractionError({
        kind: 'frame-extraction-failed',
        reason: 'ffmpeg produced no frames',
      })
    }
    const expected = expectedFrameCount(durationSeconds, settings.intervalSeconds)
    if (frameCount !== expected) {
      log?.warn(`extracted ${frameCount} frames, expected ${expected}`)
    } else {
      log?.info(`extracted ${frameCount} frames`)
    }
    progress(1)
    return { framesDir: paths.framesDir, frameIntervalSeconds: settings.intervalSeconds }
  }

  const identifySlides = async (checkpoint: Checkpoint): Promise<CheckpointPatch> => {
    const framesDir = checkpoint.framesDir
    if (!framesDir) throw missingField(checkpoint, 'frames directory')
    const progress = progressIn('identify-slides', 'detecting slides')
    progress(0)

    let files: string[]
    try {
      files = await listImageFiles(framesDir)
    } catch (error) {
      throw createExtractionError(
        {
          kind: 'frame-extraction-failed',
          reason: `cannot read frames in ${framesDir}; rerun with --fresh`,
        },
        error
      )
    }

    const intervalSeconds = checkpoint.frameIntervalSeconds ?? settings.intervalSeconds

    // Phase 1: hash in parallel into a pre-sized array, so order never depends on timing.
    const tasks = files.map((fileName, index) => async () => {
      const sequenceNumber = index + 1
      const timestamp = frameTimestamp(sequenceNumber, intervalSeconds)
      const sourcePath = path.join(framesDir, fileName)
      const fingerprint = await collaborators.hashEngine.fingerprint(sourcePath, { timestamp })
      return { sequenceNumber, timestamp, sourcePath, fingerprint }
    })
    const hashed = await runWithConcurrency(tasks, settings.workers, (completed, total) =>
      progress((completed / total) * 0.8, `${completed}/${total}`)
    )

    // Phase 2: sequential from here on.
    const frames: FrameRecord[] = []
    let corrupt = 0
    for (const entry of hashed) {
      if (entry.fingerprint.ok) {
        frames.push({
          frameId: `frame-${entry.sequenceNumber}`,
          sequenceNumber: entry.sequenceNumber,
          timestamp: entry.timestamp,
          fingerprint: entry.fingerprint.value,
          sourcePath: entry.sourcePath,
        })
        continue
      }
      const { error } = entry.fingerprint
      if (error.kind !== 'corrupt-frame') throw error
      corrupt += 1
      log?.warn(error.message)
      if (corrupt > settings.maxCorruptFrames) {
        throw createExtractionError({
          kind: 'too-many-corrupt-frames',
          count: corrupt,
          max: settings.maxCorruptFrames,
        })
      }
    }
    if (corrupt > 0) log?.warn(`skipped ${corrupt} corrupt frame(s)`)

    const slides = groupFrames(frames, {
      threshold: settings.similarityThreshold,
      strategy: settings.strategy,
      similarity: collaborators.hashEngine.similarity,
    })
    const bySourcePath = new Map(frames.map((frame) => [frame.sourcePath, frame]))

    await resetDir(paths.slidesDir)
    const manifest: SlideManifestEntry[] = []
    for (const slide of slides) {
      const frame = bySourcePath.get(slide.imagePath)
      if (!frame) {
        throw createExtractionError({
          kind: 'internal',
          detail: `representative frame ${slide.representativeFrameId} is not in the frame list`,
        })
      }
      const fileName = slideFileName(slide.slideIndex, path.extname(frame.sourcePath))
      await fs.copyFile(frame.sourcePath, path.join(paths.slidesDir, fileName))
      manifest.push({
        index: slide.slideIndex,
        fileName,
        timestamp: slide.timestamp,
        sequenceNumber: frame.sequenceNumber,
        frameCount: slide.frameCount,
      })
    }

    const memory = guard.validate()
    if (!memory.ok) throw memory.error
    guard.checkAndWarn(log)

    log?.info(`${frames.length} frames grouped into ${manifest.length} slide(s)`)
    progress(1)
    return { slidesDir: paths.slidesDir, slides: manifest }
  }

  const generateReport = async (checkpoint: Checkpoint): Promise<CheckpointPatch> => {
    const { slidesDir, slides: manifest, videoMetadata } = checkpoint
    if (!slidesDir) throw missingField(checkpoint, 'slides directory')
    if (!manifest) throw missingField(checkpoint, 'slide manifest')
    if (!videoMetadata) throw missingField(checkpoint, 'video metadata')
    if (manifest.length === 0) throw createExtractionError({ kind: 'no-slides-found' })
    const progress = progressIn('generate-report', 'recognizing text')
    progress(0)

    const ordered = [...manifest].sort((a, b) =>
      a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0
    )
    const tasks = ordered.map((entry) => async () => ({
      entry,
      outcome: await collaborators.textRecognizer.recognize({
        imagePath: path.join(slidesDir, entry.fileName),
        languages: settings.languages,
        timeoutMs: settings.ocrTimeoutMs,
      }),
    }))
    const recognized = await runWithConcurrency(tasks, settings.workers, (completed, total) =>
      progress((completed / total) * 0.9, `${completed}/${total}`)
    )

    const slides: SlideRecord[] = []
    for (const { entry, outcome } of recognized) {
      if (!outcome.ok) {
        const { failure } = outcome.error
        throw failure.kind === 'ocr-failed'
          ? createExtractionError({ ...failure, slideIndex: entry.index }, outcome.error.cause)
          : outcome.error
      }
      const { text, confidence } = outcome.value
      if (text.trim() && confidence < settings.ocrConfidenceThreshold) {
        log?.warn(
          `slide ${entry.index}: low OCR confidence ${Math.round(confidence * 100)}%`
        )
      }
      slides.push({
        slideIndex: entry.index,
        representativeFrameId: `frame-${entry.sequenceNumber}`,
        timestamp: entry.timestamp,
        imagePath: path.join(slidesDir, entry.fileName),
        frameCount: entry.frameCount,
        recognizedText: text,
        confidence,
      })
    }

    await writeReport(paths.reportPath, {
      metadata: videoMetadata,
      sourceUrl: checkpoint.sourceUrl ?? locator.canonicalUrl,
      slides,
      reportDir: path.dirname(paths.reportPath),
      lowConfidenceThreshold: settings.ocrConfidenceThreshold,
      timeline: settings.timeline,
    })
    progress(1)
    return { reportPath: paths.reportPath }
  }

  const runStage = (stage: PipelineStage, checkpoint: Checkpoint): Promise<CheckpointPatch> => {
    switch (stage) {
      case 'fetch-metadata':
        return fetchMetadata()
      case 'download-video':
        return downloadVideo(checkpoint)
      case 'extract-frames':
        return extractFrames(checkpoint)
      case 'identify-slides':
        return identifySlides(checkpoint)
      case 'generate-report':
        return generateReport(checkpoint)
    }
  }

  const cleanup = async (checkpoint: Checkpoint) => {
    if (!settings.cleanup) return
    const targets = [
      checkpoint.videoPath ? { target: checkpoint.videoPath, recursive: false } : null,
      checkpoint.framesDir ? { target: checkpoint.framesDir, recursive: true } : null,
    ]
    for (const item of targets) {
      if (!item) continue
      try {
        await fs.rm(item.target, { recursive: item.recursive, force: true })
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        log?.warn(`cleanup failed for ${item.target}: ${message}`)
      }
    }
  }

  await ensureSessionDir(paths.sessionDir)
  if (fresh) {
    await discardSession(paths, sessionId)
    log?.info(`discarded previous state for session ${sessionId}`)
  }

  let checkpoint: Checkpoint
  const loaded = await loadCheckpoint(paths.checkpointPath)
  if (loaded.state === 'loaded') {
    checkpoint = loaded.checkpoint
    if (checkpoint.sourceUrl && checkpoint.sourceUrl !== locator.canonicalUrl) {
      throw createExtractionError({
        kind: 'invalid-config',
        detail: `session "${sessionId}" belongs to ${checkpoint.sourceUrl}; pass --fresh or choose another --session`,
      })
    }
    log?.info(`resuming session ${sessionId} at ${checkpoint.status}`)
    const sampledEvery = checkpoint.frameIntervalSeconds
    if (
      hasReached(checkpoint, 'frames-extracted') &&
      sampledEvery !== null &&
      sampledEvery !== settings.intervalSeconds
    ) {
      log?.warn(
        `frames were sampled every ${sampledEvery}s; ignoring interval ${settings.intervalSeconds}s (pass --fresh to resample)`
      )
    }
  } else {
    if (loaded.state === 'invalid') {
      log?.warn(`ignoring checkpoint: ${loaded.reason}; starting over`)
    }
    checkpoint = createCheckpoint({ sessionId, sourceUrl: locator.canonicalUrl, now: now() })
    await saveCheckpoint(paths.checkpointPath, checkpoint)
  }

  const executedStages: PipelineStage[] = []
  for (let stage = nextStage(checkpoint); stage !== null; stage = nextStage(checkpoint)) {
    log?.debug(`stage ${stage} starting`)
    try {
      const patch = await runStage(stage, checkpoint)
      checkpoint = advance(checkpoint, STAGE_TARGET[stage], patch, now())
      await saveCheckpoint(paths.checkpointPath, checkpoint)
    } catch (error) {
      const failure = toExtractionError(error)
      const failed = recordFailure(checkpoint, { stage, error: failure }, now())
      await saveCheckpoint(paths.checkpointPath, failed).catch((saveError: unknown) => {
        const message = saveError instanceof Error ? saveError.message : String(saveError)
        log?.error(`could not record failure in ${paths.checkpointPath}: ${message}`)
      })
      throw failure
    }
    executedStages.push(stage)
    log?.debug(`stage ${stage} done; status ${checkpoint.status}`)
  }

  await cleanup(checkpoint)
  report('done', 100)

  return {
    sessionId,
    sessionDir: paths.sessionDir,
    reportPath: checkpoint.reportPath ?? paths.reportPath,
    checkpoint,
    slideCount: checkpoint.slides?.length ?? 0,
    executedStages,
  }
}
