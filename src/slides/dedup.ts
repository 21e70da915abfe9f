import { createExtractionError } from '../errors.js'
import { hashSimilarity } from './hash.js'
import type { FrameRecord, RepresentativeStrategy, SlideRecord } from './types.js'

export const REPRESENTATIVE_STRATEGIES: readonly RepresentativeStrategy[] = [
  'first',
  'middle',
  'last',
]

export type DedupOptions = {
  threshold: number
  strategy: RepresentativeStrategy
  similarity?: (a: string, b: string) => number
}

/**
 * Single forward pass. Each frame is compared against the first frame of the open
 * cluster, not its predecessor, so slow drift stays in one cluster while the
 * anchor still matches.
 */
export function clusterFrames(
  frames: readonly FrameRecord[],
  {
    threshold,
    similarity = hashSimilarity,
  }: { threshold: number; similarity?: (a: string, b: string) => number }
): FrameRecord[][] {
  const clusters: FrameRecord[][] = []
  let open: FrameRecord[] = []
  for (const frame of frames) {
    const anchor = open[0]
    if (!anchor) {
      open = [frame]
      continue
    }
    if (similarity(anchor.fingerprint, frame.fingerprint) >= threshold) {
      open.push(frame)
      continue
    }
    clusters.push(open)
    open = [frame]
  }
  if (open.length > 0) clusters.push(open)
  return clusters
}

export function selectRepresentative<T>(cluster: readonly T[], strategy: RepresentativeStrategy): T {
  const index =
    strategy === 'first'
      ? 0
      : strategy === 'last'
        ? cluster.length - 1
        : Math.floor(cluster.length / 2)
  const picked = cluster[index]
  if (picked === undefined) {
    throw createExtractionError({ kind: 'internal', detail: 'cannot pick from an empty cluster' })
  }
  return picked
}

export function groupFrames(
  frames: readonly FrameRecord[],
  { threshold, strategy, similarity }: DedupOptions
): SlideRecord[] {
  if (frames.length === 0) {
    throw createExtractionError({ kind: 'no-slides-found' })
  }
  return clusterFrames(frames, { threshold, similarity }).map((cluster, index) => {
    const representative = selectRepresentative(cluster, strategy)
    return {
      slideIndex: index + 1,
      representativeFrameId: representative.frameId,
      timestamp: representative.timestamp,
      imagePath: representative.sourcePath,
      frameCount: cluster.length,
      recognizedText: null,
      confidence: null,
    }
  })
}
