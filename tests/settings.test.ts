import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { DEFAULT_SETTINGS, resolveExtractionSettings } from '../src/settings.js'

const cwd = '/work'

describe('resolveExtractionSettings', () => {
  it('falls back to defaults', () => {
    expect(resolveExtractionSettings({ flags: {}, env: {}, config: null, cwd })).toEqual({
      ...DEFAULT_SETTINGS,
      outputDir: join(cwd, 'output'),
    })
  })

  it('prefers flags over config values', () => {
    const settings = resolveExtractionSettings({
      flags: {
        interval: '2',
        threshold: '0.9',
        strategy: 'first',
        hash: 'ahash',
        lang: 'eng+deu',
        frameFormat: 'png',
        maxDuration: '90m',
        retries: '5',
        timeout: '45s',
        timeline: false,
        keepArtifacts: true,
      },
      env: {},
      config: {
        intervalSeconds: 10,
        similarityThreshold: 0.5,
        strategy: 'last',
        languages: ['fra'],
        maxDuration: 60,
        maxRetries: 1,
        timeoutMs: 1000,
        timeline: true,
        cleanup: true,
      },
      cwd,
    })

    expect(settings).toMatchObject({
      intervalSeconds: 2,
      similarityThreshold: 0.9,
      strategy: 'first',
      hashAlgorithm: 'average',
      languages: ['eng', 'deu'],
      frameFormat: 'png',
      maxDurationSeconds: 5400,
      timeline: false,
      cleanup: false,
    })
    expect(settings.retry).toEqual({ ...DEFAULT_SETTINGS.retry, maxRetries: 5, timeoutMs: 45_000 })
  })

  it('reads config values when no flag is given', () => {
    const settings = resolveExtractionSettings({
      flags: {},
      env: {},
      config: {
        outputDir: '/data/slides',
        languages: ['ENG', 'eng', 'jpn'],
        memoryThresholdMb: 2048,
        memoryWarningFraction: 0.5,
        maxDuration: 600,
        maxCorruptFrames: 3,
        minFreeDiskMb: 0,
        timeline: false,
        cleanup: false,
        ytDlpFormat: 'best',
      },
      cwd,
    })

    expect(settings).toMatchObject({
      outputDir: '/data/slides',
      languages: ['eng', 'jpn'],
      memoryThresholdMb: 2048,
      memoryWarningFraction: 0.5,
      maxDurationSeconds: 600,
      maxCorruptFrames: 3,
      minFreeDiskMb: 0,
      timeline: false,
      cleanup: false,
      ytDlpFormat: 'best',
    })
  })

  it('resolves the output directory from flag, env, then config', () => {
    const resolve = (flags: { output?: string }, env: Record<string, string>) =>
      resolveExtractionSettings({ flags, env, config: { outputDir: 'from-config' }, cwd }).outputDir

    expect(resolve({ output: 'from-flag' }, { SLIDESCRIBE_OUTPUT_DIR: 'from-env' })).toBe(
      join(cwd, 'from-flag')
    )
    expect(resolve({}, { SLIDESCRIBE_OUTPUT_DIR: 'from-env' })).toBe(join(cwd, 'from-env'))
    expect(resolve({}, {})).toBe(join(cwd, 'from-config'))
  })

  it('takes workers from flag, then a clamped env value, then config', () => {
    const workers = (flag: string | undefined, env: Record<string, string>, config: number) =>
      resolveExtractionSettings({ flags: { workers: flag }, env, config: { workers: config }, cwd })
        .workers

    expect(workers('4', { SLIDESCRIBE_WORKERS: '2' }, 6)).toBe(4)
    expect(workers(undefined, { SLIDESCRIBE_WORKERS: '64' }, 6)).toBe(16)
    expect(workers(undefined, { SLIDESCRIBE_WORKERS: 'lots' }, 6)).toBe(6)
  })

  it('names the offending source in range errors', () => {
    expect(() =>
      resolveExtractionSettings({ flags: { interval: '0' }, env: {}, config: null, cwd })
    ).toThrow('Unsupported --interval: 0 (range 0.1-60)')
    expect(() =>
      resolveExtractionSettings({
        flags: {},
        env: {},
        config: { similarityThreshold: 1.5 },
        cwd,
      })
    ).toThrow('Unsupported extraction.similarityThreshold: 1.5 (range 0-1)')
    expect(() =>
      resolveExtractionSettings({ flags: { memoryThreshold: '50' }, env: {}, config: null, cwd })
    ).toThrow('Unsupported --memory-threshold: 50 (range 100-1048576)')
    expect(() =>
      resolveExtractionSettings({ flags: { workers: '2.5' }, env: {}, config: null, cwd })
    ).toThrow('Unsupported --workers: 2.5 (integer)')
    expect(() =>
      resolveExtractionSettings({ flags: { interval: 'fast' }, env: {}, config: null, cwd })
    ).toThrow('Unsupported --interval: fast')
  })

  it('rejects unknown or missing OCR languages', () => {
    expect(() =>
      resolveExtractionSettings({ flags: { lang: 'eng+xyz+klingon' }, env: {}, config: null, cwd })
    ).toThrow(/^Invalid configuration: Unsupported --lang: xyz, klingon \(supported: eng, spa,/)
    expect(() =>
      resolveExtractionSettings({ flags: {}, env: {}, config: { languages: [' '] }, cwd })
    ).toThrow('(at least one language is required)')
  })
})
