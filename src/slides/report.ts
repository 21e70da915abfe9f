import path from 'node:path'

import { createExtractionError } from '../errors.js'
import { writeFileAtomic } from './checkpoint.js'
import type { SlideRecord, VideoMetadata } from './types.js'

export type ReportInput = {
  metadata: VideoMetadata
  sourceUrl: string
  slides: readonly SlideRecord[]
  /** Directory the report lives in; slide images are linked relative to it. */
  reportDir: string
  lowConfidenceThreshold: number
  timeline: boolean
}

function formatUploadDate(raw: string): string {
  const match = raw.match(/^(\d{4})(\d{2})(\d{2})$/)
  return match ? `${match[1]}-${match[2]}-${match[3]}` : raw
}

function toPosix(relative: string): string {
  return relative.split(path.sep).join('/')
}

export function renderTimeline(slides: readonly SlideRecord[]): string[] {
  const lines = ['```mermaid', 'graph LR']
  for (const slide of slides) {
    lines.push(
      `    S${slide.slideIndex}["Slide ${slide.slideIndex} (${slide.timestamp.toFixed(0)}s)"]`
    )
  }
  for (let i = 1; i < slides.length; i += 1) {
    const prev = slides[i - 1]
    const current = slides[i]
    if (prev && current) lines.push(`    S${prev.slideIndex} --> S${current.slideIndex}`)
  }
  lines.push('```')
  return lines
}

export function renderReport({
  metadata,
  sourceUrl,
  slides,
  reportDir,
  lowConfidenceThreshold,
  timeline,
}: ReportInput): string {
  const lines: string[] = [`# ${metadata.title}`, '', '## Video Information', '']
  lines.push(`- **URL:** ${sourceUrl}`)
  lines.push(`- **Duration:** ${Math.round(metadata.durationSeconds)} seconds`)
  if (metadata.uploader) lines.push(`- **Uploader:** ${metadata.uploader}`)
  if (metadata.uploadDate) lines.push(`- **Upload Date:** ${formatUploadDate(metadata.uploadDate)}`)
  if (metadata.width && metadata.height) {
    lines.push(`- **Resolution:** ${metadata.width}x${metadata.height}`)
  }
  lines.push(`- **Extracted Slides:** ${slides.length}`)
  lines.push('')

  if (timeline && slides.length > 0) {
    lines.push('## Timeline', '', ...renderTimeline(slides), '')
  }

  lines.push('## Slides Detail', '')
  for (const slide of slides) {
    const imageRef = toPosix(path.relative(reportDir, slide.imagePath))
    lines.push(`### Slide ${slide.slideIndex}`, '')
    lines.push(`- **Timestamp:** ${slide.timestamp.toFixed(2)}s`, '')
    lines.push(`![Slide ${slide.slideIndex}](${imageRef})`, '')
    lines.push('#### Extracted Text', '')
    const text = slide.recognizedText?.trim() ?? ''
    lines.push(text ? text : '*No text detected.*', '')
    if (text && slide.confidence !== null && slide.confidence < lowConfidenceThreshold) {
      lines.push(
        `> **Note:** Low OCR confidence (${Math.round(slide.confidence * 100)}%); the extracted text may be inaccurate.`,
        ''
      )
    }
    lines.push('---', '')
  }

  return `${lines.join('\n').trimEnd()}\n`
}

/** Replaces any previous report only once the new one is fully written. */
export async function writeReport(reportPath: string, input: ReportInput): Promise<void> {
  const markdown = renderReport(input)
  try {
    await writeFileAtomic(reportPath, markdown)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw createExtractionError({ kind: 'report-failed', reason }, error)
  }
}
