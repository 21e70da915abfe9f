export type ErrorCategory =
  | 'validation'
  | 'configuration'
  | 'network'
  | 'external-dependency'
  | 'processing'
  | 'resource'
  | 'file-system'
  | 'internal'

export type ExtractionFailure =
  | { kind: 'invalid-url'; url: string }
  | { kind: 'invalid-config'; detail: string }
  | { kind: 'video-unavailable'; videoId: string; reason: string }
  | { kind: 'video-private' }
  | { kind: 'video-deleted' }
  | { kind: 'video-age-restricted' }
  | { kind: 'video-region-locked' }
  | { kind: 'video-too-long'; durationSeconds: number; maxSeconds: number }
  | { kind: 'download-failed'; attempts: number; reason: string }
  | { kind: 'network-timeout'; timeoutMs: number }
  | { kind: 'dependency-missing'; tool: string; instructions: string; troubleshooting: string[] }
  | { kind: 'frame-extraction-failed'; reason: string }
  | { kind: 'corrupt-frame'; timestamp: number; reason: string }
  | { kind: 'too-many-corrupt-frames'; count: number; max: number }
  | { kind: 'no-slides-found' }
  | { kind: 'ocr-failed'; slideIndex: number; reason: string }
  | { kind: 'report-failed'; reason: string }
  | { kind: 'memory-threshold-exceeded'; usedMb: number; thresholdMb: number }
  | { kind: 'insufficient-disk-space'; requiredMb: number; availableMb: number }
  | { kind: 'permission-denied'; resource: string }
  | { kind: 'internal'; detail: string }

export type ExtractionErrorKind = ExtractionFailure['kind']

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: ExtractionError }

export const succeed = <T>(value: T): Outcome<T> => ({ ok: true, value })

export const fail = <T>(error: ExtractionError): Outcome<T> => ({ ok: false, error })

export function categorize(failure: ExtractionFailure): ErrorCategory {
  switch (failure.kind) {
    case 'invalid-url':
    case 'video-private':
    case 'video-deleted':
    case 'video-age-restricted':
    case 'video-region-locked':
    case 'video-too-long':
      return 'validation'
    case 'invalid-config':
      return 'configuration'
    case 'video-unavailable':
    case 'download-failed':
    case 'network-timeout':
      return 'network'
    case 'dependency-missing':
      return 'external-dependency'
    case 'frame-extraction-failed':
    case 'corrupt-frame':
    case 'too-many-corrupt-frames':
    case 'no-slides-found':
    case 'ocr-failed':
    case 'report-failed':
      return 'processing'
    case 'memory-threshold-exceeded':
    case 'insufficient-disk-space':
      return 'resource'
    case 'permission-denied':
      return 'file-system'
    case 'internal':
      return 'internal'
  }
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`
}

export function describeFailure(failure: ExtractionFailure): string {
  switch (failure.kind) {
    case 'invalid-url':
      return `Invalid YouTube URL: ${failure.url}`
    case 'invalid-config':
      return `Invalid configuration: ${failure.detail}`
    case 'video-unavailable':
      return `Video '${failure.videoId}' is unavailable: ${failure.reason}`
    case 'video-private':
      return 'Video private: this video is not publicly available'
    case 'video-deleted':
      return 'Video deleted: the video has been removed by the uploader'
    case 'video-age-restricted':
      return 'Video age-restricted: cannot download age-restricted content'
    case 'video-region-locked':
      return 'Video region-locked: not available in your region'
    case 'video-too-long':
      return `Video too long: ${failure.durationSeconds} seconds (maximum: ${failure.maxSeconds} seconds)`
    case 'download-failed':
      return `Download failed after ${failure.attempts} attempt(s): ${failure.reason}`
    case 'network-timeout':
      return `Network timeout after ${formatSeconds(failure.timeoutMs)}`
    case 'dependency-missing':
      return `External dependency unavailable: ${failure.tool}`
    case 'frame-extraction-failed':
      return `Frame extraction failed: ${failure.reason}`
    case 'corrupt-frame':
      return `Corrupt frame at timestamp ${failure.timestamp}s - skipping`
    case 'too-many-corrupt-frames':
      return `Too many corrupt frames: ${failure.count} frames skipped (maximum: ${failure.max})`
    case 'no-slides-found':
      return 'No unique slides found'
    case 'ocr-failed':
      return `OCR failed for slide ${failure.slideIndex}: ${failure.reason}`
    case 'report-failed':
      return `Report generation failed: ${failure.reason}`
    case 'memory-threshold-exceeded':
      return `Memory threshold exceeded: using ${failure.usedMb}MB of ${failure.thresholdMb}MB limit`
    case 'insufficient-disk-space':
      return `Insufficient disk space: required ${failure.requiredMb}MB, available ${failure.availableMb}MB`
    case 'permission-denied':
      return `Permission denied: ${failure.resource}`
    case 'internal':
      return `Internal error: ${failure.detail}`
  }
}

export function explainFailure(failure: ExtractionFailure): string {
  switch (failure.kind) {
    case 'invalid-url':
      return `The YouTube URL '${failure.url}' is invalid. Provide a watch, short or embed link such as https://www.youtube.com/watch?v=VIDEO_ID or https://youtu.be/VIDEO_ID.`
    case 'invalid-config':
      return `Invalid configuration: ${failure.detail}. Check the flags and ~/.slidescribe/config.json, then try again.`
    case 'video-unavailable':
      return `The video '${failure.videoId}' is unavailable. It may have been removed or made unavailable by the uploader.`
    case 'video-private':
      return 'The video is private and not publicly available. Try a different video.'
    case 'video-deleted':
      return 'The video has been deleted by the uploader and is no longer available. Try a different video.'
    case 'video-age-restricted':
      return 'The video is age-restricted and cannot be downloaded. Age-restricted content is not supported.'
    case 'video-region-locked':
      return 'The video is not available in your current region. Try a different video.'
    case 'video-too-long':
      return `The video is ${failure.durationSeconds} seconds long, over the ${failure.maxSeconds} second limit. Process a shorter video or raise --max-duration.`
    case 'download-failed':
      return `Failed to download the video after ${failure.attempts} attempt(s): ${failure.reason}. Check your connection and try again; the video may also be unavailable or region-locked.`
    case 'network-timeout':
      return `The network request timed out after ${formatSeconds(failure.timeoutMs)}. Check your connection, or raise --timeout on slow networks.`
    case 'dependency-missing': {
      const steps = failure.troubleshooting.map((step) => `  - ${step}`).join('\n')
      return `${failure.tool} is not installed or not found in PATH.\n${failure.instructions}${steps ? `\nTroubleshooting:\n${steps}` : ''}`
    }
    case 'frame-extraction-failed':
      return `Failed to extract frames from the video: ${failure.reason}. The video file may be damaged or ffmpeg may be misconfigured.`
    case 'corrupt-frame':
      return `Corrupt frame detected at ${failure.timestamp}s. This frame will be skipped; many corrupt frames usually mean a damaged download.`
    case 'too-many-corrupt-frames':
      return `Skipped ${failure.count} corrupt frames (maximum allowed: ${failure.max}). The video file may be damaged; rerun with --fresh to download it again.`
    case 'no-slides-found':
      return 'No unique slides were found in the video. Either it has no slides, the similarity threshold is too high, or the frame interval is too large. Lower --threshold or --interval.'
    case 'ocr-failed':
      return `Text recognition failed for slide ${failure.slideIndex}: ${failure.reason}. Make sure tesseract and the requested language data are installed.`
    case 'report-failed':
      return `Could not write the report: ${failure.reason}. Check the output directory permissions.`
    case 'memory-threshold-exceeded':
      return `Memory usage reached ${failure.usedMb}MB of the ${failure.thresholdMb}MB limit. Process a shorter video, raise --interval, or raise --memory-threshold.`
    case 'insufficient-disk-space':
      return `Only ${failure.availableMb}MB free where ${failure.requiredMb}MB is required. Free up disk space or choose a different --output directory.`
    case 'permission-denied':
      return `Permission denied for ${failure.resource}. Check that you can write to this location or choose a different --output directory.`
    case 'internal':
      return `An internal error occurred: ${failure.detail}. Please report this with the command you ran.`
  }
}

export class ExtractionError extends Error {
  readonly failure: ExtractionFailure
  readonly category: ErrorCategory
  readonly userMessage: string

  constructor(failure: ExtractionFailure, options?: { cause?: unknown }) {
    super(describeFailure(failure), options)
    this.name = 'ExtractionError'
    this.failure = failure
    this.category = categorize(failure)
    this.userMessage = explainFailure(failure)
  }

  get kind(): ExtractionErrorKind {
    return this.failure.kind
  }
}

export function createExtractionError(
  failure: ExtractionFailure,
  cause?: unknown
): ExtractionError {
  return new ExtractionError(failure, cause === undefined ? undefined : { cause })
}

export function isExtractionError(value: unknown): value is ExtractionError {
  return value instanceof ExtractionError
}

export function toExtractionError(error: unknown): ExtractionError {
  if (error instanceof ExtractionError) return error
  const message = error instanceof Error ? error.message : String(error)
  return createExtractionError({ kind: 'internal', detail: message }, error)
}

/** Transient failures worth another attempt. */
export function isRetryable(error: ExtractionError): boolean {
  return error.kind === 'network-timeout'
}
