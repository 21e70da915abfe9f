import { beforeEach, describe, expect, it, vi } from 'vitest'

import { createFakeProcess } from './helpers/fake-process.js'

const spawnMock = vi.hoisted(() => vi.fn())

vi.mock('node:child_process', () => ({ spawn: spawnMock }))

import { fail, succeed } from '../src/errors.js'
import { createTesseractRecognizer, parseTesseractTsv } from '../src/slides/tesseract.js'
import { createDependencyMissingError } from '../src/slides/tools.js'

const HEADER =
  'level\tpage_num\tblock_num\tpar_num\tline_num\tword_num\tleft\ttop\twidth\theight\tconf\ttext'

const row = (block: number, par: number, line: number, word: number, conf: number, text: string) =>
  [5, 1, block, par, line, word, 0, 0, 10, 10, conf, text].join('\t')

const SAMPLE_TSV = [
  HEADER,
  '1\t1\t0\t0\t0\t0\t0\t0\t1280\t720\t-1\t',
  row(1, 1, 1, 1, 90, 'Hello'),
  row(1, 1, 1, 2, 80, 'World'),
  row(1, 1, 2, 1, 70, 'Second'),
  row(1, 1, 2, 2, 95, '  '),
  '',
].join('\n')

describe('parseTesseractTsv', () => {
  it('joins words per line and averages word confidence', () => {
    expect(parseTesseractTsv(SAMPLE_TSV)).toEqual({ text: 'Hello World\nSecond', confidence: 0.8 })
  })

  it('returns empty text with zero confidence when nothing was recognized', () => {
    expect(parseTesseractTsv(`${HEADER}\n`)).toEqual({ text: '', confidence: 0 })
  })

  it('keeps separate blocks on separate lines', () => {
    const tsv = [HEADER, row(1, 1, 1, 1, 50, 'Title'), row(2, 1, 1, 1, 50, 'Body')].join('\n')
    expect(parseTesseractTsv(tsv)).toEqual({ text: 'Title\nBody', confidence: 0.5 })
  })
})

describe('createTesseractRecognizer', () => {
  beforeEach(() => {
    spawnMock.mockReset()
  })

  it('runs tesseract with the joined language list and parses its TSV', async () => {
    spawnMock.mockImplementation(() => createFakeProcess({ stdout: SAMPLE_TSV }))
    const recognizer = createTesseractRecognizer({
      resolveTool: () => succeed('/usr/bin/tesseract'),
    })

    const result = await recognizer.recognize({
      imagePath: '/out/s1/slides/slide_0001.jpg',
      languages: ['eng', 'deu'],
      timeoutMs: 5000,
    })

    expect(result).toEqual({ ok: true, value: { text: 'Hello World\nSecond', confidence: 0.8 } })
    expect(spawnMock).toHaveBeenCalledWith(
      '/usr/bin/tesseract',
      ['/out/s1/slides/slide_0001.jpg', 'stdout', '-l', 'eng+deu', 'tsv'],
      { stdio: ['ignore', 'pipe', 'pipe'] }
    )
  })

  it('turns a non-zero exit into ocr-failed', async () => {
    spawnMock.mockImplementation(() =>
      createFakeProcess({ stderr: 'Error opening data file\n', code: 1 })
    )
    const recognizer = createTesseractRecognizer({
      resolveTool: () => succeed('/usr/bin/tesseract'),
    })

    const result = await recognizer.recognize({
      imagePath: '/out/s1/slides/slide_0001.jpg',
      languages: ['eng'],
      timeoutMs: 5000,
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.failure).toEqual({
      kind: 'ocr-failed',
      slideIndex: 0,
      reason: 'tesseract exited with code 1: Error opening data file',
    })
  })

  it('reports a missing binary without spawning', async () => {
    const recognizer = createTesseractRecognizer({
      resolveTool: () => fail(createDependencyMissingError('tesseract')),
    })

    const result = await recognizer.recognize({
      imagePath: '/out/s1/slides/slide_0001.jpg',
      languages: ['eng'],
      timeoutMs: 5000,
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('dependency-missing')
    expect(result.error.message).toBe('External dependency unavailable: Tesseract OCR')
    expect(spawnMock).not.toHaveBeenCalled()
  })
})
