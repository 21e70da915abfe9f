import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { createFakeProcess } from './helpers/fake-process.js'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import { fail, succeed } from '../src/errors.js'
import {
  buildFrameExtractionArgs,
  createFfmpegFrameSampler,
  createFfmpegGrayscaleSampler,
  createFfprobe,
  expectedFrameCount,
  frameTimestamp,
  parseFfmpegProgressSeconds,
  parseFfprobeOutput,
} from '../src/slides/ffmpeg.js'
import { createDependencyMissingError } from '../src/slides/tools.js'

const resolveTool = () => succeed('/usr/bin/ffmpeg')

describe('frame arithmetic', () => {
  it('expects ceil(duration / interval) frames, at least one', () => {
    expect(expectedFrameCount(65, 5)).toBe(13)
    expect(expectedFrameCount(60, 5)).toBe(12)
    expect(expectedFrameCount(3, 5)).toBe(1)
    expect(expectedFrameCount(0, 5)).toBe(1)
    expect(expectedFrameCount(60, 0)).toBe(1)
  })

  it('places frame n at (n - 1) * interval', () => {
    expect(frameTimestamp(1, 5)).toBe(0)
    expect(frameTimestamp(3, 5)).toBe(10)
    expect(frameTimestamp(4, 0.5)).toBe(1.5)
  })
})

describe('buildFrameExtractionArgs', () => {
  it('samples at 1/interval fps into numbered files', () => {
    expect(
      buildFrameExtractionArgs({
        videoPath: '/out/s1/video.mp4',
        outputDir: '/out/s1/frames',
        intervalSeconds: 5,
        format: 'jpg',
      })
    ).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-nostats',
      '-y',
      '-i',
      '/out/s1/video.mp4',
      '-vf',
      'fps=1/5',
      '-q:v',
      '2',
      '-progress',
      'pipe:1',
      '/out/s1/frames/frame_%05d.jpg',
    ])
  })

  it('skips the jpeg quality flag for png', () => {
    const args = buildFrameExtractionArgs({
      videoPath: '/v.mp4',
      outputDir: '/f',
      intervalSeconds: 2,
      format: 'png',
    })
    expect(args).not.toContain('-q:v')
    expect(args.at(-1)).toBe('/f/frame_%05d.png')
  })
})

describe('parseFfmpegProgressSeconds', () => {
  it('reads microsecond progress keys', () => {
    expect(parseFfmpegProgressSeconds('out_time_us=2500000')).toBe(2.5)
    expect(parseFfmpegProgressSeconds('out_time_ms=1000000')).toBe(1)
    expect(parseFfmpegProgressSeconds('frame=10')).toBeNull()
  })
})

describe('parseFfprobeOutput', () => {
  it('takes size from the video stream and duration from the stream or format', () => {
    const output = JSON.stringify({
      streams: [
        { codec_type: 'audio', duration: '64.9' },
        { codec_type: 'video', width: 1280, height: 720 },
      ],
      format: { duration: '65.02' },
    })
    expect(parseFfprobeOutput(output)).toEqual({ durationSeconds: 65.02, width: 1280, height: 720 })
  })
})

describe('ffmpeg collaborators', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  it('counts the frames written by ffmpeg and reports progress', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'slidescribe-frames-'))
    spawnMock.mockImplementation(() => {
      for (const name of ['frame_00001.jpg', 'frame_00002.jpg', 'frame_00003.jpg']) {
        writeFileSync(join(dir, name), 'jpeg')
      }
      return createFakeProcess({ stdout: 'out_time_us=5000000\nprogress=end\n' })
    })
    const onProgress = vi.fn()
    const sampler = createFfmpegFrameSampler({ resolveTool })

    const result = await sampler.extractFrames({
      videoPath: '/out/s1/video.mp4',
      outputDir: dir,
      intervalSeconds: 5,
      format: 'jpg',
      durationSeconds: 10,
      timeoutMs: 5000,
      onProgress,
    })

    expect(result).toEqual({ ok: true, value: { frameCount: 3 } })
    expect(onProgress).toHaveBeenCalledWith(50)
  })

  it('turns an ffmpeg error into frame-extraction-failed', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'slidescribe-frames-'))
    spawnMock.mockImplementation(() =>
      createFakeProcess({ stderr: 'Invalid data found when processing input\n', code: 1 })
    )
    const sampler = createFfmpegFrameSampler({ resolveTool })

    const result = await sampler.extractFrames({
      videoPath: '/out/s1/video.mp4',
      outputDir: dir,
      intervalSeconds: 5,
      format: 'jpg',
      durationSeconds: 10,
      timeoutMs: 5000,
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.failure).toEqual({
      kind: 'frame-extraction-failed',
      reason: 'ffmpeg exited with code 1: Invalid data found when processing input',
    })
  })

  it('reads gray samples from rawvideo output', async () => {
    spawnMock.mockImplementation(() => createFakeProcess({ stdout: Buffer.from([1, 2, 3, 4]) }))
    const sample = createFfmpegGrayscaleSampler({ resolveTool })

    const pixels = await sample({ imagePath: '/f/frame_00001.jpg', width: 2, height: 2 })

    expect(Array.from(pixels)).toEqual([1, 2, 3, 4])
    expect(spawnMock.mock.calls[0]?.[1]).toContain('scale=2:2:flags=area,format=gray')
  })

  it('throws the dependency error from the sampler when ffmpeg is missing', async () => {
    const sample = createFfmpegGrayscaleSampler({
      resolveTool: () => fail(createDependencyMissingError('ffmpeg')),
    })

    await expect(sample({ imagePath: '/f/frame_00001.jpg', width: 2, height: 2 })).rejects.toThrow(
      'External dependency unavailable: FFmpeg'
    )
  })

  it('returns unknown probe values and reports why', async () => {
    spawnMock.mockImplementation(() => createFakeProcess({ stderr: 'moov atom not found\n', code: 1 }))
    const onError = vi.fn()
    const probe = createFfprobe({ resolveTool: () => succeed('/usr/bin/ffprobe'), onError })

    const result = await probe('/out/s1/video.mp4')

    expect(result).toEqual({ durationSeconds: null, width: null, height: null })
    expect(onError).toHaveBeenCalledWith('ffprobe failed: ffprobe exited with code 1: moov atom not found')
  })
})
