import { promises as fs } from 'node:fs'
import path from 'node:path'

import { createExtractionError, fail, succeed } from '../errors.js'
import type { GrayscaleSampler } from './hash.js'
import { listImageFiles } from './store.js'
import {
  isProcessTimeoutError,
  runProcess,
  runProcessCapture,
  type ToolResolver,
} from './tools.js'
import type { FrameSampler, ProbedVideo } from './types.js'

const PROBE_TIMEOUT_MS = 30_000
const SAMPLE_TIMEOUT_MS = 30_000

/** `ceil(duration / interval)`, never less than one. */
export function expectedFrameCount(durationSeconds: number, intervalSeconds: number): number {
  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) return 1
  if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) return 1
  return Math.max(1, Math.ceil(durationSeconds / intervalSeconds))
}

export function frameTimestamp(sequenceNumber: number, intervalSeconds: number): number {
  return Math.max(0, sequenceNumber - 1) * intervalSeconds
}

export function buildFrameExtractionArgs({
  videoPath,
  outputDir,
  intervalSeconds,
  format,
}: {
  videoPath: string
  outputDir: string
  intervalSeconds: number
  format: 'jpg' | 'png'
}): string[] {
  return [
    '-hide_banner',
    '-loglevel',
    'error',
    '-nostats',
    '-y',
    '-i',
    videoPath,
    '-vf',
    `fps=1/${intervalSeconds}`,
    ...(format === 'jpg' ? ['-q:v', '2'] : []),
    '-progress',
    'pipe:1',
    path.join(outputDir, `frame_%05d.${format}`),
  ]
}

/** ffmpeg `-progress` emits `out_time_us=` (older builds: `out_time_ms=`, also microseconds). */
export function parseFfmpegProgressSeconds(line: string): number | null {
  const match = line.trim().match(/^out_time_(?:us|ms)=(\d+)$/)
  if (!match) return null
  const micros = Number(match[1])
  return Number.isFinite(micros) ? micros / 1_000_000 : null
}

export function createFfmpegFrameSampler({
  resolveTool,
}: {
  resolveTool: ToolResolver
}): FrameSampler {
  const extractFrames: FrameSampler['extractFrames'] = async ({
    videoPath,
    outputDir,
    intervalSeconds,
    format,
    durationSeconds,
    timeoutMs,
    onProgress,
  }) => {
    const tool = resolveTool('ffmpeg')
    if (!tool.ok) return tool
    await fs.mkdir(outputDir, { recursive: true })
    try {
      await runProcess({
        command: tool.value,
        args: buildFrameExtractionArgs({ videoPath, outputDir, intervalSeconds, format }),
        timeoutMs,
        errorLabel: 'ffmpeg',
        onStdoutLine: (line) => {
          if (!onProgress || durationSeconds <= 0) return
          const seconds = parseFfmpegProgressSeconds(line)
          if (seconds === null) return
          onProgress(Math.min(100, Math.round((seconds / durationSeconds) * 100)))
        },
      })
    } catch (error) {
      const reason = isProcessTimeoutError(error)
        ? `ffmpeg did not finish within ${Math.round(timeoutMs / 1000)}s`
        : error instanceof Error
          ? error.message
          : String(error)
      return fail(createExtractionError({ kind: 'frame-extraction-failed', reason }, error))
    }
    const frames = await listImageFiles(outputDir)
    return succeed({ frameCount: frames.length })
  }

  return { extractFrames }
}

/** Rasterizes one image to `width x height` gray samples via ffmpeg's rawvideo muxer. */
export function createFfmpegGrayscaleSampler({
  resolveTool,
  timeoutMs = SAMPLE_TIMEOUT_MS,
}: {
  resolveTool: ToolResolver
  timeoutMs?: number
}): GrayscaleSampler {
  return async ({ imagePath, width, height }) => {
    const tool = resolveTool('ffmpeg')
    if (!tool.ok) throw tool.error
    const buffer = await runProcessCapture({
      command: tool.value,
      args: [
        '-hide_banner',
        '-loglevel',
        'error',
        '-i',
        imagePath,
        '-frames:v',
        '1',
        '-vf',
        `scale=${width}:${height}:flags=area,format=gray`,
        '-f',
        'rawvideo',
        '-pix_fmt',
        'gray',
        '-',
      ],
      timeoutMs,
      errorLabel: 'ffmpeg',
    })
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.length)
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseFfprobeOutput(output: string): ProbedVideo {
  const parsed: unknown = JSON.parse(output)
  let durationSeconds: number | null = null
  let width: number | null = null
  let height: number | null = null
  if (!isRecord(parsed)) return { durationSeconds, width, height }
  const streams = Array.isArray(parsed.streams) ? parsed.streams : []
  for (const stream of streams) {
    if (!isRecord(stream) || stream.codec_type !== 'video') continue
    if (width == null && typeof stream.width === 'number') width = stream.width
    if (height == null && typeof stream.height === 'number') height = stream.height
    const duration = Number(stream.duration)
    if (Number.isFinite(duration) && duration > 0) durationSeconds = duration
  }
  if (durationSeconds == null && isRecord(parsed.format)) {
    const formatDuration = Number(parsed.format.duration)
    if (Number.isFinite(formatDuration) && formatDuration > 0) durationSeconds = formatDuration
  }
  return { durationSeconds, width, height }
}

export function createFfprobe({
  resolveTool,
  onError,
}: {
  resolveTool: ToolResolver
  onError?: ((message: string) => void) | null
}): (filePath: string) => Promise<ProbedVideo> {
  const unknown: ProbedVideo = { durationSeconds: null, width: null, height: null }
  return async (filePath) => {
    const tool = resolveTool('ffprobe')
    if (!tool.ok) {
      onError?.(tool.error.message)
      return unknown
    }
    try {
      const output = await runProcessCapture({
        command: tool.value,
        args: ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', filePath],
        timeoutMs: PROBE_TIMEOUT_MS,
        errorLabel: 'ffprobe',
      })
      return parseFfprobeOutput(output.toString('utf8'))
    } catch (error) {
      onError?.(`ffprobe failed: ${error instanceof Error ? error.message : String(error)}`)
      return unknown
    }
  }
}
