import { promises as fs } from 'node:fs'
import path from 'node:path'

import {
  createExtractionError,
  type ExtractionError,
  type ExtractionFailure,
  fail,
  isExtractionError,
  succeed,
} from '../errors.js'
import { isMediaFile } from './store.js'
import { isProcessTimeoutError, runProcess, runProcessCapture, type ToolResolver } from './tools.js'
import type { FetchedMetadata, ProbedVideo, ProgressCallback, VideoSource } from './types.js'

// Prefer broadly-decodable H.264/MP4 for ffmpeg stability.
export const DEFAULT_YT_DLP_FORMAT =
  'bestvideo[height<=720][vcodec^=avc1][ext=mp4]/best[height<=720][vcodec^=avc1][ext=mp4]/bestvideo[height<=720][ext=mp4]/best[height<=720]'

const PROGRESS_TEMPLATE =
  'progress:%(progress.downloaded_bytes)s|%(progress.total_bytes)s|%(progress.total_bytes_estimate)s'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0B'
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  let value = bytes
  let unit = units[0] ?? 'B'
  for (let i = 1; i < units.length && value >= 1024; i += 1) {
    value /= 1024
    unit = units[i] ?? unit
  }
  const rounded = value >= 100 ? Math.round(value) : Math.round(value * 10) / 10
  return `${rounded}${unit}`
}

export function parseYtDlpProgressLine(line: string): { percent: number; detail?: string } | null {
  const trimmed = line.trim()
  if (trimmed.startsWith('progress:')) {
    const [downloadedRaw = '', totalRaw = '', estimateRaw = ''] = trimmed
      .slice('progress:'.length)
      .split('|')
    const downloaded = Number.parseFloat(downloadedRaw)
    if (!Number.isFinite(downloaded) || downloaded < 0) return null
    const totalCandidate = Number.parseFloat(totalRaw)
    const estimateCandidate = Number.parseFloat(estimateRaw)
    const totalBytes =
      Number.isFinite(totalCandidate) && totalCandidate > 0
        ? totalCandidate
        : Number.isFinite(estimateCandidate) && estimateCandidate > 0
          ? estimateCandidate
          : null
    if (!totalBytes) return null
    const percent = Math.max(0, Math.min(100, Math.round((downloaded / totalBytes) * 100)))
    return { percent, detail: `(${formatBytes(downloaded)}/${formatBytes(totalBytes)})` }
  }
  if (!trimmed.startsWith('[download]')) return null
  const percentMatch = trimmed.match(/\b(\d{1,3}(?:\.\d+)?)%/)
  if (!percentMatch) return null
  const percent = Number(percentMatch[1])
  if (!Number.isFinite(percent) || percent < 0 || percent > 100) return null
  const etaMatch = trimmed.match(/\bETA\s+(\S+)/)
  const speedMatch = trimmed.match(/\bat\s+(\S+)/)
  const detailParts = [
    speedMatch?.[1] ? `at ${speedMatch[1]}` : null,
    etaMatch?.[1] ? `ETA ${etaMatch[1]}` : null,
  ].filter((part): part is string => part !== null)
  return detailParts.length ? { percent, detail: detailParts.join(' ') } : { percent }
}

/** Maps yt-dlp stderr onto the failure taxonomy. Order matters: region notices often start with "Video unavailable". */
export function classifyYtDlpFailure({
  message,
  videoId,
}: {
  message: string
  videoId: string
}): ExtractionFailure {
  const lower = message.toLowerCase()
  if (lower.includes('private video') || lower.includes('video is private')) {
    return { kind: 'video-private' }
  }
  if (
    lower.includes('age-restricted') ||
    lower.includes('age restricted') ||
    lower.includes('confirm your age') ||
    lower.includes('sign in to confirm') ||
    lower.includes('age-gate')
  ) {
    return { kind: 'video-age-restricted' }
  }
  if (
    lower.includes('in your country') ||
    lower.includes('geo restrict') ||
    lower.includes('geo-restrict') ||
    lower.includes('region')
  ) {
    return { kind: 'video-region-locked' }
  }
  if (
    lower.includes('has been removed') ||
    lower.includes('deleted') ||
    lower.includes('account associated with this video has been terminated')
  ) {
    return { kind: 'video-deleted' }
  }
  if (lower.includes('unavailable') || lower.includes('not found') || lower.includes('http error 404')) {
    return { kind: 'video-unavailable', videoId, reason: firstErrorLine(message) }
  }
  if (lower.includes('timed out') || lower.includes('timeout')) {
    return { kind: 'network-timeout', timeoutMs: 0 }
  }
  return { kind: 'download-failed', attempts: 1, reason: firstErrorLine(message) }
}

function firstErrorLine(message: string): string {
  const lines = message
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
  return lines.find((line) => line.startsWith('ERROR:')) ?? lines[0] ?? 'unknown error'
}

function toYtDlpError(error: unknown, { videoId, timeoutMs }: { videoId: string; timeoutMs: number }): ExtractionError {
  if (isExtractionError(error)) return error
  if (isProcessTimeoutError(error)) {
    return createExtractionError({ kind: 'network-timeout', timeoutMs }, error)
  }
  const message = error instanceof Error ? error.message : String(error)
  const failure = classifyYtDlpFailure({ message, videoId })
  return createExtractionError(
    failure.kind === 'network-timeout' ? { kind: 'network-timeout', timeoutMs } : failure,
    error
  )
}

const optionalNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null

const optionalString = (value: unknown): string | null =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : null

export function parseYtDlpMetadata(raw: string, videoId: string): FetchedMetadata {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw createExtractionError(
      { kind: 'download-failed', attempts: 1, reason: 'yt-dlp returned invalid metadata JSON' },
      error
    )
  }
  if (!isRecord(parsed)) {
    throw createExtractionError({
      kind: 'download-failed',
      attempts: 1,
      reason: 'yt-dlp returned unexpected metadata',
    })
  }
  return {
    metadata: {
      videoId: optionalString(parsed.id) ?? videoId,
      title: optionalString(parsed.title) ?? `YouTube video ${videoId}`,
      durationSeconds: optionalNumber(parsed.duration) ?? 0,
      width: optionalNumber(parsed.width),
      height: optionalNumber(parsed.height),
      uploader: optionalString(parsed.uploader) ?? optionalString(parsed.channel),
      uploadDate: optionalString(parsed.upload_date),
    },
    ageLimit: optionalNumber(parsed.age_limit),
    availability: optionalString(parsed.availability),
  }
}

async function findDownloadedFile(dir: string, baseName: string): Promise<string | null> {
  const entries = await fs.readdir(dir)
  const candidates: Array<{ filePath: string; size: number }> = []
  for (const entry of entries) {
    if (!entry.startsWith(`${baseName}.`)) continue
    if (entry.endsWith('.part') || entry.endsWith('.ytdl')) continue
    if (!isMediaFile(entry, 'video')) continue
    const filePath = path.join(dir, entry)
    const stat = await fs.stat(filePath).catch(() => null)
    if (stat?.isFile()) candidates.push({ filePath, size: stat.size })
  }
  candidates.sort((a, b) => b.size - a.size)
  return candidates[0]?.filePath ?? null
}

export function createYtDlpSource({
  resolveTool,
  probeVideo,
  format = DEFAULT_YT_DLP_FORMAT,
}: {
  resolveTool: ToolResolver
  probeVideo: (filePath: string) => Promise<ProbedVideo>
  format?: string
}): VideoSource {
  const fetchMetadata: VideoSource['fetchMetadata'] = async ({ url, videoId, timeoutMs }) => {
    const tool = resolveTool('yt-dlp')
    if (!tool.ok) return tool
    try {
      const output = await runProcessCapture({
        command: tool.value,
        args: ['--dump-json', '--no-playlist', '--no-warnings', url],
        timeoutMs,
        errorLabel: 'yt-dlp',
      })
      return succeed(parseYtDlpMetadata(output.toString('utf8'), videoId))
    } catch (error) {
      return fail(toYtDlpError(error, { videoId, timeoutMs }))
    }
  }

  const download: VideoSource['download'] = async ({
    url,
    destinationDir,
    baseName,
    timeoutMs,
    onProgress,
  }) => {
    const tool = resolveTool('yt-dlp')
    if (!tool.ok) return tool
    const report: ProgressCallback | null = onProgress ?? null
    const handleLine = (line: string) => {
      if (!report) return
      const progress = parseYtDlpProgressLine(line)
      if (progress) report(progress.percent, progress.detail)
    }
    await fs.mkdir(destinationDir, { recursive: true })
    try {
      await runProcess({
        command: tool.value,
        args: [
          '-f',
          format,
          '--no-playlist',
          '--no-warnings',
          '--concurrent-fragments',
          '4',
          ...(report ? ['--progress', '--newline', '--progress-template', PROGRESS_TEMPLATE] : []),
          '-o',
          path.join(destinationDir, `${baseName}.%(ext)s`),
          url,
        ],
        timeoutMs,
        errorLabel: 'yt-dlp',
        onStderrLine: handleLine,
        onStdoutLine: handleLine,
      })
    } catch (error) {
      return fail(toYtDlpError(error, { videoId: baseName, timeoutMs }))
    }

    const filePath = await findDownloadedFile(destinationDir, baseName)
    if (!filePath) {
      return fail(
        createExtractionError({
          kind: 'download-failed',
          attempts: 1,
          reason: 'yt-dlp completed but no video file was downloaded',
        })
      )
    }
    return succeed({ filePath, probe: await probeVideo(filePath) })
  }

  return { fetchMetadata, download }
}
