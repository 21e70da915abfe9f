import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { ExtractionError } from '../errors.js'
import type { SlideManifestEntry, VideoMetadata } from './types.js'

export const CHECKPOINT_FILE = 'session.json'

export const CHECKPOINT_STATUSES = [
  'starting',
  'metadata-fetched',
  'video-downloaded',
  'frames-extracted',
  'unique-slides-identified',
  'completed',
] as const

export type CheckpointStatus = (typeof CHECKPOINT_STATUSES)[number]

export type PipelineStage =
  | 'fetch-metadata'
  | 'download-video'
  | 'extract-frames'
  | 'identify-slides'
  | 'generate-report'

export const STAGE_TARGET: Record<PipelineStage, CheckpointStatus> = {
  'fetch-metadata': 'metadata-fetched',
  'download-video': 'video-downloaded',
  'extract-frames': 'frames-extracted',
  'identify-slides': 'unique-slides-identified',
  'generate-report': 'completed',
}

const STAGE_AFTER: Record<CheckpointStatus, PipelineStage | null> = {
  starting: 'fetch-metadata',
  'metadata-fetched': 'download-video',
  'video-downloaded': 'extract-frames',
  'frames-extracted': 'identify-slides',
  'unique-slides-identified': 'generate-report',
  completed: null,
}

export type CheckpointFailure = {
  kind: string
  message: string
  stage: PipelineStage
  at: string
}

export type Checkpoint = {
  sessionId: string
  sourceUrl: string | null
  status: CheckpointStatus
  videoMetadata: VideoMetadata | null
  videoPath: string | null
  framesDir: string | null
  slidesDir: string | null
  reportPath: string | null
  /** Seconds between the frames in `framesDir`; timestamps derive from this, not current settings. */
  frameIntervalSeconds: number | null
  slides: SlideManifestEntry[] | null
  /** Last failed attempt; informational only, never moves `status`. */
  failure: CheckpointFailure | null
  createdAt: string
  updatedAt: string
}

export type CheckpointPatch = Partial<
  Pick<
    Checkpoint,
    | 'videoMetadata'
    | 'videoPath'
    | 'framesDir'
    | 'slidesDir'
    | 'reportPath'
    | 'frameIntervalSeconds'
    | 'slides'
  >
>

export function createCheckpoint({
  sessionId,
  sourceUrl,
  now = new Date(),
}: {
  sessionId: string
  sourceUrl: string | null
  now?: Date
}): Checkpoint {
  const stamp = now.toISOString()
  return {
    sessionId,
    sourceUrl,
    status: 'starting',
    videoMetadata: null,
    videoPath: null,
    framesDir: null,
    slidesDir: null,
    reportPath: null,
    frameIntervalSeconds: null,
    slides: null,
    failure: null,
    createdAt: stamp,
    updatedAt: stamp,
  }
}

const statusRank = (status: CheckpointStatus) => CHECKPOINT_STATUSES.indexOf(status)

export function hasReached(checkpoint: Checkpoint, status: CheckpointStatus): boolean {
  return statusRank(checkpoint.status) >= statusRank(status)
}

/** Pure: the stage that must run next, or null once the session is complete. */
export function nextStage(checkpoint: Pick<Checkpoint, 'status'>): PipelineStage | null {
  return STAGE_AFTER[checkpoint.status]
}

export function advance(
  checkpoint: Checkpoint,
  status: CheckpointStatus,
  patch: CheckpointPatch,
  now: Date = new Date()
): Checkpoint {
  if (statusRank(status) <= statusRank(checkpoint.status)) {
    throw new Error(`Checkpoint cannot move from ${checkpoint.status} to ${status}`)
  }
  // Recorded paths are never cleared by a patch.
  return {
    ...checkpoint,
    status,
    videoMetadata: patch.videoMetadata ?? checkpoint.videoMetadata,
    videoPath: patch.videoPath ?? checkpoint.videoPath,
    framesDir: patch.framesDir ?? checkpoint.framesDir,
    slidesDir: patch.slidesDir ?? checkpoint.slidesDir,
    reportPath: patch.reportPath ?? checkpoint.reportPath,
    frameIntervalSeconds: patch.frameIntervalSeconds ?? checkpoint.frameIntervalSeconds,
    slides: patch.slides ?? checkpoint.slides,
    failure: null,
    updatedAt: now.toISOString(),
  }
}

export function recordFailure(
  checkpoint: Checkpoint,
  { stage, error }: { stage: PipelineStage; error: ExtractionError },
  now: Date = new Date()
): Checkpoint {
  const at = now.toISOString()
  return {
    ...checkpoint,
    failure: { kind: error.kind, message: error.message, stage, at },
    updatedAt: at,
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStatus(value: unknown): value is CheckpointStatus {
  return CHECKPOINT_STATUSES.some((status) => status === value)
}

function isStage(value: unknown): value is PipelineStage {
  return typeof value === 'string' && Object.hasOwn(STAGE_TARGET, value)
}

const optionalString = (value: unknown): string | null =>
  typeof value === 'string' && value.length > 0 ? value : null

const optionalNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null

const optionalPositive = (value: unknown): number | null => {
  const number = optionalNumber(value)
  return number !== null && number > 0 ? number : null
}

function parseVideoMetadata(raw: unknown): VideoMetadata | null {
  if (!isRecord(raw)) return null
  const durationSeconds = optionalNumber(raw.durationSeconds)
  if (typeof raw.title !== 'string' || durationSeconds === null) return null
  return {
    videoId: optionalString(raw.videoId) ?? '',
    title: raw.title,
    durationSeconds,
    width: optionalNumber(raw.width),
    height: optionalNumber(raw.height),
    uploader: optionalString(raw.uploader),
    uploadDate: optionalString(raw.uploadDate),
  }
}

function parseSlides(raw: unknown): SlideManifestEntry[] | null {
  if (!Array.isArray(raw)) return null
  const entries: SlideManifestEntry[] = []
  for (const item of raw) {
    if (!isRecord(item)) return null
    const index = optionalNumber(item.index)
    const timestamp = optionalNumber(item.timestamp)
    const fileName = optionalString(item.fileName)
    if (index === null || timestamp === null || fileName === null) return null
    entries.push({
      index,
      fileName,
      timestamp,
      sequenceNumber: optionalNumber(item.sequenceNumber) ?? index,
      frameCount: optionalNumber(item.frameCount) ?? 1,
    })
  }
  return entries
}

function parseFailure(raw: unknown): CheckpointFailure | null {
  if (!isRecord(raw)) return null
  const kind = optionalString(raw.kind)
  const message = optionalString(raw.message)
  const at = optionalString(raw.at)
  if (!kind || !message || !at || !isStage(raw.stage)) return null
  return { kind, message, stage: raw.stage, at }
}

/** Unknown fields are ignored; anything structurally wrong yields null. */
export function parseCheckpoint(raw: string): Checkpoint | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return null
  }
  if (!isRecord(parsed)) return null
  const sessionId = optionalString(parsed.sessionId)
  if (!sessionId || !isStatus(parsed.status)) return null
  const fallbackStamp = new Date(0).toISOString()
  return {
    sessionId,
    sourceUrl: optionalString(parsed.sourceUrl),
    status: parsed.status,
    videoMetadata: parseVideoMetadata(parsed.videoMetadata),
    videoPath: optionalString(parsed.videoPath),
    framesDir: optionalString(parsed.framesDir),
    slidesDir: optionalString(parsed.slidesDir),
    reportPath: optionalString(parsed.reportPath),
    frameIntervalSeconds: optionalPositive(parsed.frameIntervalSeconds),
    slides: parseSlides(parsed.slides),
    failure: parseFailure(parsed.failure),
    createdAt: optionalString(parsed.createdAt) ?? fallbackStamp,
    updatedAt: optionalString(parsed.updatedAt) ?? fallbackStamp,
  }
}

export type LoadedCheckpoint =
  | { state: 'missing' }
  | { state: 'invalid'; reason: string }
  | { state: 'loaded'; checkpoint: Checkpoint }

export async function loadCheckpoint(filePath: string): Promise<LoadedCheckpoint> {
  let raw: string
  try {
    raw = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return { state: 'missing' }
    const message = error instanceof Error ? error.message : String(error)
    return { state: 'invalid', reason: message }
  }
  const checkpoint = parseCheckpoint(raw)
  if (!checkpoint) return { state: 'invalid', reason: `unreadable checkpoint at ${filePath}` }
  return { state: 'loaded', checkpoint }
}

/** Write-then-rename, so a crash never leaves a half-written checkpoint. */
export async function saveCheckpoint(filePath: string, checkpoint: Checkpoint): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(checkpoint, null, 2)}\n`)
}

export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
  const tmpPath = `${filePath}.${process.pid}.tmp`
  try {
    await fs.writeFile(tmpPath, contents, 'utf8')
    await fs.rename(tmpPath, filePath)
  } catch (error) {
    await fs.rm(tmpPath, { force: true })
    throw error
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
