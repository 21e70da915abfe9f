import { promises as fs } from 'node:fs'
import path from 'node:path'

import mime from 'mime'

import { CHECKPOINT_FILE } from './checkpoint.js'

export type SessionPaths = {
  sessionDir: string
  checkpointPath: string
  framesDir: string
  slidesDir: string
  reportPath: string
}

export function resolveSessionPaths(outputDir: string, sessionId: string): SessionPaths {
  const sessionDir = path.resolve(outputDir, sessionId)
  return {
    sessionDir,
    checkpointPath: path.join(sessionDir, CHECKPOINT_FILE),
    framesDir: path.join(sessionDir, 'frames'),
    slidesDir: path.join(sessionDir, 'slides'),
    reportPath: path.join(sessionDir, 'report.md'),
  }
}

export function isMediaFile(fileName: string, kind: 'image' | 'video'): boolean {
  const type = mime.getType(fileName)
  return typeof type === 'string' && type.startsWith(`${kind}/`)
}

/** Image files only, sorted by name; frame and slide names encode their order. */
export async function listImageFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && isMediaFile(entry.name, 'image'))
    .map((entry) => entry.name)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
}

export function slideFileName(index: number, extension: string): string {
  const ext = extension.startsWith('.') ? extension : `.${extension}`
  return `slide_${index.toString().padStart(4, '0')}${ext.toLowerCase()}`
}

/** Free space in MB on the volume holding `dir`, or null when the platform cannot tell. */
export async function readFreeDiskMb(dir: string): Promise<number | null> {
  const stats = await fs.statfs(dir).catch(() => null)
  if (!stats) return null
  return Math.floor((stats.bavail * stats.bsize) / (1024 * 1024))
}

export async function resetDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true })
  await fs.mkdir(dir, { recursive: true })
}
