import { createExtractionError, fail, succeed } from '../errors.js'
import { isProcessTimeoutError, runProcessCapture, type ToolResolver } from './tools.js'
import type { RecognizedText, TextRecognizer } from './types.js'

const CONF_COLUMN = 10
const TEXT_COLUMN = 11

/**
 * Parses `tesseract ... tsv` output. Words with negative confidence (layout rows)
 * or blank text are dropped; words sharing block/paragraph/line keep one line.
 * Confidence is the mean word confidence scaled to [0, 1].
 */
export function parseTesseractTsv(tsv: string): RecognizedText {
  const lines = new Map<string, string[]>()
  let confidenceSum = 0
  let words = 0
  const rows = tsv.split(/\r?\n/).slice(1)
  for (const row of rows) {
    if (!row.trim()) continue
    const columns = row.split('\t')
    const conf = Number.parseFloat(columns[CONF_COLUMN] ?? '')
    const text = (columns[TEXT_COLUMN] ?? '').trim()
    if (!Number.isFinite(conf) || conf < 0 || !text) continue
    const key = `${columns[2] ?? ''}:${columns[3] ?? ''}:${columns[4] ?? ''}`
    const line = lines.get(key)
    if (line) {
      line.push(text)
    } else {
      lines.set(key, [text])
    }
    confidenceSum += conf
    words += 1
  }
  const text = Array.from(lines.values(), (line) => line.join(' ')).join('\n')
  const confidence = words === 0 ? 0 : Math.min(1, confidenceSum / words / 100)
  return { text, confidence }
}

export function createTesseractRecognizer({
  resolveTool,
}: {
  resolveTool: ToolResolver
}): TextRecognizer {
  const recognize: TextRecognizer['recognize'] = async ({ imagePath, languages, timeoutMs }) => {
    const tool = resolveTool('tesseract')
    if (!tool.ok) return tool
    try {
      const output = await runProcessCapture({
        command: tool.value,
        args: [imagePath, 'stdout', '-l', languages.join('+'), 'tsv'],
        timeoutMs,
        errorLabel: 'tesseract',
      })
      return succeed(parseTesseractTsv(output.toString('utf8')))
    } catch (error) {
      const reason = isProcessTimeoutError(error)
        ? `tesseract did not finish within ${Math.round(timeoutMs / 1000)}s`
        : error instanceof Error
          ? error.message
          : String(error)
      // Slide index is attached by the caller, which knows it.
      return fail(createExtractionError({ kind: 'ocr-failed', slideIndex: 0, reason }, error))
    }
  }

  return { recognize }
}
