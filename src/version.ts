import { readFileSync } from 'node:fs'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

let cached: string | null = null

/** Reads `version` from the package.json one level above this module (src/ or dist/). */
export function resolvePackageVersion(): string {
  if (cached) return cached
  let version = '0.0.0'
  try {
    const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8')
    const parsed: unknown = JSON.parse(raw)
    if (isRecord(parsed) && typeof parsed.version === 'string') version = parsed.version
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    process.emitWarning(`Could not read package version: ${message}`)
  }
  cached = version
  return version
}
