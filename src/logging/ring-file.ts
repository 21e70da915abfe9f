import fs from 'node:fs/promises'
import path from 'node:path'

export type RingFileOptions = {
  filePath: string
  maxBytes: number
  maxFiles: number
  onError?: ((error: unknown) => void) | null
}

export type RingFileWriter = {
  write: (line: string) => void
  flush: () => Promise<void>
}

const normalizeMaxFiles = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1

const normalizeMaxBytes = (value: number) =>
  Number.isFinite(value) && value > 0 ? Math.max(1, Math.trunc(value)) : 1024

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

async function fileSize(pathValue: string): Promise<number> {
  try {
    const stat = await fs.stat(pathValue)
    return stat.size
  } catch (error) {
    if (isMissingFile(error)) return 0
    throw error
  }
}

async function renameIfPresent(src: string, dest: string) {
  try {
    await fs.rename(src, dest)
  } catch (error) {
    if (!isMissingFile(error)) throw error
  }
}

async function rotateFiles(filePath: string, maxFiles: number) {
  if (maxFiles <= 1) {
    await fs.writeFile(filePath, '', 'utf8')
    return
  }

  for (let i = maxFiles - 1; i >= 1; i -= 1) {
    const src = i === 1 ? filePath : `${filePath}.${i - 1}`
    const dest = `${filePath}.${i}`
    await fs.rm(dest, { force: true })
    await renameIfPresent(src, dest)
  }
}

/** Appends lines to `filePath`, shifting it to `.1`, `.2`, ... once it would exceed `maxBytes`. */
export function createRingFileWriter(options: RingFileOptions): RingFileWriter {
  const filePath = options.filePath
  const maxBytes = normalizeMaxBytes(options.maxBytes)
  const maxFiles = normalizeMaxFiles(options.maxFiles)
  const onError = options.onError ?? null
  const dir = path.dirname(filePath)
  let ensureDir: Promise<unknown> | null = null
  let chain = Promise.resolve()

  const enqueue = (task: () => Promise<void>) => {
    chain = chain.then(task).catch((error: unknown) => {
      onError?.(error)
    })
  }

  const write = (line: string) => {
    const normalized = line.endsWith('\n') ? line : `${line}\n`
    const bytes = Buffer.byteLength(normalized, 'utf8')
    enqueue(async () => {
      ensureDir ??= fs.mkdir(dir, { recursive: true })
      await ensureDir
      const currentSize = await fileSize(filePath)
      if (currentSize > 0 && currentSize + bytes > maxBytes) {
        await rotateFiles(filePath, maxFiles)
      }
      await fs.appendFile(filePath, normalized, 'utf8')
    })
  }

  const flush = async () => await chain

  return { write, flush }
}
