import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { loadSlidescribeConfig, resolveConfigPath } from '../src/config.js'

const writeConfig = (contents: string) => {
  const dir = mkdtempSync(join(tmpdir(), 'slidescribe-config-'))
  const path = join(dir, 'config.json')
  writeFileSync(path, contents)
  return path
}

describe('config loading', () => {
  it('resolves the config path from SLIDESCRIBE_CONFIG, then HOME', () => {
    expect(resolveConfigPath({ SLIDESCRIBE_CONFIG: '/etc/slidescribe.json', HOME: '/home/a' })).toBe(
      '/etc/slidescribe.json'
    )
    expect(resolveConfigPath({ HOME: '/home/a' })).toBe('/home/a/.slidescribe/config.json')
    expect(resolveConfigPath({})).toBeNull()
  })

  it('returns null config when the file does not exist', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'slidescribe-config-')), 'missing.json')
    expect(loadSlidescribeConfig({ env: { SLIDESCRIBE_CONFIG: path } })).toEqual({
      config: null,
      path,
    })
  })

  it('parses JSON5 with extraction and logging sections', () => {
    const path = writeConfig(`{
      // trailing commas and comments are fine
      extraction: {
        intervalSeconds: 2,
        languages: [' eng ', 'deu', ''],
        timeline: false,
        ytDlpFormat: '  best ',
      },
      logging: { level: 'INFO', format: 'json', file: '/tmp/x.log', maxFiles: 2.7 },
    }`)

    expect(loadSlidescribeConfig({ env: { SLIDESCRIBE_CONFIG: path } }).config).toEqual({
      extraction: {
        outputDir: undefined,
        intervalSeconds: 2,
        similarityThreshold: undefined,
        strategy: undefined,
        hashAlgorithm: undefined,
        languages: ['eng', 'deu'],
        ocrConfidenceThreshold: undefined,
        memoryThresholdMb: undefined,
        memoryWarningFraction: undefined,
        maxDuration: undefined,
        maxCorruptFrames: undefined,
        minFreeDiskMb: undefined,
        frameFormat: undefined,
        workers: undefined,
        maxRetries: undefined,
        timeoutMs: undefined,
        timeline: false,
        cleanup: undefined,
        ytDlpFormat: 'best',
      },
      logging: {
        enabled: undefined,
        level: 'info',
        format: 'json',
        file: '/tmp/x.log',
        maxMb: undefined,
        maxFiles: 2,
      },
    })
  })

  it('drops empty sections', () => {
    const path = writeConfig('{ "extraction": {} }')
    expect(loadSlidescribeConfig({ env: { SLIDESCRIBE_CONFIG: path } }).config).toEqual({})
  })

  it('rejects invalid JSON and wrong types', () => {
    const broken = writeConfig('{ extraction: ')
    expect(() => loadSlidescribeConfig({ env: { SLIDESCRIBE_CONFIG: broken } })).toThrow(
      `Invalid JSON in config file ${broken}:`
    )

    const array = writeConfig('[]')
    expect(() => loadSlidescribeConfig({ env: { SLIDESCRIBE_CONFIG: array } })).toThrow(
      `Invalid config file ${array}: expected an object at the top level`
    )

    const wrongType = writeConfig('{ "extraction": { "workers": "four" } }')
    expect(() => loadSlidescribeConfig({ env: { SLIDESCRIBE_CONFIG: wrongType } })).toThrow(
      `Invalid config file ${wrongType}: "extraction.workers" must be a number.`
    )

    const badLevel = writeConfig('{ "logging": { "level": "trace" } }')
    expect(() => loadSlidescribeConfig({ env: { SLIDESCRIBE_CONFIG: badLevel } })).toThrow(
      `Invalid config file ${badLevel}: "logging.level" must be one of "debug", "info", "warn", "error".`
    )

    const badMax = writeConfig('{ "logging": { "maxMb": 0 } }')
    expect(() => loadSlidescribeConfig({ env: { SLIDESCRIBE_CONFIG: badMax } })).toThrow(
      `Invalid config file ${badMax}: "logging.maxMb" must be positive.`
    )
  })
})
