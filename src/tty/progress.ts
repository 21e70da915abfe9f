export type ProgressSink = {
  update: (text: string) => void
  done: () => void
}

export function isRichTty(stream: NodeJS.WritableStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true
}

export function supportsColor(
  stream: NodeJS.WritableStream,
  env: Record<string, string | undefined>
): boolean {
  if (env.NO_COLOR) return false
  if (env.FORCE_COLOR && env.FORCE_COLOR !== '0') return true
  if (!isRichTty(stream)) return false
  const term = env.TERM?.toLowerCase()
  if (!term || term === 'dumb') return false
  return true
}

/**
 * On a TTY one status line is redrawn in place; elsewhere each distinct status
 * is printed on its own line.
 */
export function createProgressSink({
  stream,
  enabled,
}: {
  stream: NodeJS.WritableStream
  enabled: boolean
}): ProgressSink {
  const rich = isRichTty(stream)
  let lastText = ''
  let drawn = false

  const update = (text: string) => {
    if (!enabled || text === lastText) return
    lastText = text
    if (rich) {
      stream.write(`\r\x1b[2K${text}`)
      drawn = true
      return
    }
    stream.write(`${text}\n`)
  }

  const done = () => {
    if (rich && drawn) stream.write('\r\x1b[2K')
    drawn = false
    lastText = ''
  }

  return { update, done }
}

/** Percent never goes backwards, and repeats of the same text are dropped. */
export function createStageProgressReporter(
  onText: ((text: string) => void) | null
): (label: string, percent: number, detail?: string) => void {
  let lastText = ''
  let lastPercent = 0
  return (label, percent, detail) => {
    if (!onText) return
    const clamped = Math.min(100, Math.max(0, Math.round(percent)))
    const nextPercent = Math.max(lastPercent, clamped)
    const suffix = detail ? ` ${detail}` : ''
    const text = `Slides: ${label}${suffix} ${nextPercent}%`
    if (text === lastText) return
    lastText = text
    lastPercent = nextPercent
    onText(text)
  }
}
