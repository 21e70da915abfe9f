import { createExtractionError, fail, type Outcome, succeed } from '../errors.js'

export type VideoLocator = {
  /** As given by the user, trimmed. */
  url: string
  videoId: string
  canonicalUrl: string
  sourceId: string
}

export type UrlValidator = {
  extractVideoId: (raw: string) => string | null
  validate: (raw: string) => Outcome<VideoLocator>
}

export const YOUTUBE_HOSTS: readonly string[] = [
  'www.youtube.com',
  'youtube.com',
  'm.youtube.com',
  'music.youtube.com',
  'youtu.be',
]

const ID_PATH_PREFIXES = ['embed', 'shorts', 'v', 'live']

/**
 * Owns its patterns; construct one per run (or share it explicitly) instead of
 * relying on module-level state.
 */
export function createUrlValidator({
  hosts = YOUTUBE_HOSTS,
}: { hosts?: readonly string[] } = {}): UrlValidator {
  const idPattern = /^[a-zA-Z0-9_-]{10,12}$/
  const allowedHosts = new Set(hosts.map((host) => host.toLowerCase()))

  const parse = (raw: string): URL | null => {
    try {
      return new URL(raw.trim())
    } catch {
      return null
    }
  }

  const extractVideoId = (raw: string): string | null => {
    const parsed = parse(raw)
    if (!parsed) return null
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') return null
    const host = parsed.hostname.toLowerCase()
    if (!allowedHosts.has(host)) return null

    const segments = parsed.pathname.split('/').filter(Boolean)
    let candidate: string | null = null
    if (host === 'youtu.be') {
      candidate = segments[0] ?? null
    } else if (segments[0] === 'watch') {
      candidate = parsed.searchParams.get('v')
    } else if (segments[0] && ID_PATH_PREFIXES.includes(segments[0])) {
      candidate = segments[1] ?? null
    }
    if (!candidate) return null
    return idPattern.test(candidate) ? candidate : null
  }

  const validate = (raw: string): Outcome<VideoLocator> => {
    const url = raw.trim()
    const videoId = extractVideoId(url)
    if (!videoId) {
      return fail(createExtractionError({ kind: 'invalid-url', url }))
    }
    return succeed({
      url,
      videoId,
      canonicalUrl: `https://www.youtube.com/watch?v=${videoId}`,
      sourceId: buildYoutubeSourceId(videoId),
    })
  }

  return { extractVideoId, validate }
}

export function buildYoutubeSourceId(videoId: string): string {
  return `youtube-${videoId}`
}

export function toSlug(value: string): string {
  const normalized = value
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '')
  if (!normalized) return ''
  const max = 64
  if (normalized.length <= max) return normalized
  return normalized.slice(0, max).replace(/-+$/g, '')
}
