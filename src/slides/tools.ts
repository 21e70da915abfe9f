import { spawn } from 'node:child_process'
import { accessSync, constants as fsConstants } from 'node:fs'
import path from 'node:path'

import { createExtractionError, fail, type Outcome, succeed } from '../errors.js'

export type ToolName = 'yt-dlp' | 'ffmpeg' | 'ffprobe' | 'tesseract'

export const TOOL_NAMES: readonly ToolName[] = ['yt-dlp', 'ffmpeg', 'ffprobe', 'tesseract']

type ToolInfo = {
  displayName: string
  envKey: string
  instructions: string
  troubleshooting: string[]
}

const FFMPEG_INSTRUCTIONS = [
  'Install FFmpeg using your package manager:',
  '  - macOS: brew install ffmpeg',
  '  - Ubuntu/Debian: sudo apt install ffmpeg',
  '  - Windows: download from https://ffmpeg.org/download.html',
].join('\n')

const FFMPEG_TROUBLESHOOTING = [
  'Ensure ffmpeg and ffprobe are in your PATH (or set FFMPEG_PATH / FFPROBE_PATH)',
  "Run 'ffmpeg -version' to verify the installation",
  'Reinstall FFmpeg if the version is too old',
]

export const TOOLS: Record<ToolName, ToolInfo> = {
  'yt-dlp': {
    displayName: 'yt-dlp',
    envKey: 'YT_DLP_PATH',
    instructions: [
      'Install yt-dlp using pip: pip install yt-dlp',
      'Or download it from https://github.com/yt-dlp/yt-dlp/releases',
    ].join('\n'),
    troubleshooting: [
      'Ensure yt-dlp is in your PATH (or set YT_DLP_PATH)',
      "Run 'yt-dlp --version' to verify the installation",
      'Update yt-dlp: pip install --upgrade yt-dlp',
      'Check whether a firewall or proxy blocks network access',
    ],
  },
  ffmpeg: {
    displayName: 'FFmpeg',
    envKey: 'FFMPEG_PATH',
    instructions: FFMPEG_INSTRUCTIONS,
    troubleshooting: FFMPEG_TROUBLESHOOTING,
  },
  ffprobe: {
    displayName: 'ffprobe',
    envKey: 'FFPROBE_PATH',
    instructions: `ffprobe ships with FFmpeg. ${FFMPEG_INSTRUCTIONS}`,
    troubleshooting: FFMPEG_TROUBLESHOOTING,
  },
  tesseract: {
    displayName: 'Tesseract OCR',
    envKey: 'TESSERACT_PATH',
    instructions: [
      'Install Tesseract OCR using your package manager:',
      '  - macOS: brew install tesseract',
      '  - Ubuntu/Debian: sudo apt install tesseract-ocr',
      '  - Windows: download from https://github.com/UB-Mannheim/tesseract/wiki',
    ].join('\n'),
    troubleshooting: [
      'Ensure tesseract is in your PATH (or set TESSERACT_PATH)',
      "Run 'tesseract --version' to verify the installation",
      'Install the language data you request (e.g. tesseract-ocr-deu)',
      'Check the TESSDATA_PREFIX environment variable',
    ],
  },
}

function isExecutable(filePath: string): boolean {
  try {
    accessSync(filePath, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

export function resolveExecutableInPath(
  binary: string,
  env: Record<string, string | undefined>
): string | null {
  if (!binary) return null
  if (path.isAbsolute(binary)) {
    return isExecutable(binary) ? binary : null
  }
  const pathEnv = env.PATH ?? ''
  for (const entry of pathEnv.split(path.delimiter)) {
    if (!entry) continue
    const candidate = path.join(entry, binary)
    if (isExecutable(candidate)) return candidate
  }
  return null
}

export function resolveToolPath(
  tool: ToolName,
  env: Record<string, string | undefined>
): string | null {
  const explicit = env[TOOLS[tool].envKey]?.trim()
  if (explicit) return resolveExecutableInPath(explicit, env)
  return resolveExecutableInPath(tool, env)
}

export function createDependencyMissingError(tool: ToolName) {
  const info = TOOLS[tool]
  return createExtractionError({
    kind: 'dependency-missing',
    tool: info.displayName,
    instructions: info.instructions,
    troubleshooting: info.troubleshooting,
  })
}

export type ToolResolver = (tool: ToolName) => Outcome<string>

/** Resolves lazily and caches, so runs that skip a stage never look its tool up. */
export function createToolResolver(env: Record<string, string | undefined>): ToolResolver {
  const cache = new Map<ToolName, string>()
  return (tool) => {
    const cached = cache.get(tool)
    if (cached) return succeed(cached)
    const resolved = resolveToolPath(tool, env)
    if (!resolved) return fail(createDependencyMissingError(tool))
    cache.set(tool, resolved)
    return succeed(resolved)
  }
}

export type DependencyStatus = {
  tool: ToolName
  displayName: string
  path: string | null
}

export function checkDependencies(env: Record<string, string | undefined>): DependencyStatus[] {
  return TOOL_NAMES.map((tool) => ({
    tool,
    displayName: TOOLS[tool].displayName,
    path: resolveToolPath(tool, env),
  }))
}

export function createProcessTimeoutError(label: string, timeoutMs: number): Error {
  const error = new Error(`${label} timed out after ${timeoutMs}ms`)
  error.name = 'ProcessTimeoutError'
  return error
}

export function isProcessTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'ProcessTimeoutError'
}

type ProcessArgs = {
  command: string
  args: string[]
  timeoutMs: number
  errorLabel: string
}

type LineSplitter = { push: (chunk: Buffer | string) => void; flush: () => void }

function splitLines(onLine: (line: string) => void): LineSplitter {
  let pending = ''
  return {
    push(chunk) {
      pending += chunk.toString()
      const lines = pending.split(/\r?\n/)
      pending = lines.pop() ?? ''
      for (const line of lines) {
        if (line) onLine(line)
      }
    },
    flush() {
      const rest = pending.trim()
      pending = ''
      if (rest) onLine(rest)
    },
  }
}

/**
 * Spawns `command` and settles once it exits. Non-zero exits reject with the
 * first 8 KiB of stderr; hitting `timeoutMs` kills the process.
 */
function spawnTool({
  command,
  args,
  timeoutMs,
  errorLabel,
  onStdout,
  onStderrLine,
}: ProcessArgs & {
  onStdout?: (chunk: Buffer) => void
  onStderrLine?: (line: string) => void
}): Promise<void> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })
    let stderr = ''
    const stderrLines = splitLines((line) => {
      onStderrLine?.(line)
      if (stderr.length < 8192) stderr += `${line}\n`
    })

    proc.stdout?.on('data', (chunk: Buffer) => {
      onStdout?.(chunk)
    })
    proc.stderr?.setEncoding('utf8')
    proc.stderr?.on('data', (chunk: Buffer | string) => {
      stderrLines.push(chunk)
    })

    const timeout = setTimeout(() => {
      proc.kill('SIGKILL')
      reject(createProcessTimeoutError(errorLabel, timeoutMs))
    }, timeoutMs)

    proc.on('error', (error) => {
      clearTimeout(timeout)
      reject(error)
    })

    proc.on('close', (code) => {
      clearTimeout(timeout)
      stderrLines.flush()
      if (code === 0) {
        resolve()
        return
      }
      const suffix = stderr.trim() ? `: ${stderr.trim()}` : ''
      reject(new Error(`${errorLabel} exited with code ${code}${suffix}`))
    })
  })
}

export async function runProcess({
  onStdoutLine,
  ...args
}: ProcessArgs & {
  onStderrLine?: (line: string) => void
  onStdoutLine?: (line: string) => void
}): Promise<void> {
  const stdoutLines = onStdoutLine ? splitLines(onStdoutLine) : null
  try {
    await spawnTool({ ...args, onStdout: (chunk) => stdoutLines?.push(chunk) })
  } finally {
    stdoutLines?.flush()
  }
}

/** Runs to completion and returns everything written to stdout. */
export async function runProcessCapture(args: ProcessArgs): Promise<Buffer> {
  const chunks: Buffer[] = []
  await spawnTool({ ...args, onStdout: (chunk) => chunks.push(chunk) })
  return Buffer.concat(chunks)
}
