import { describe, expect, it } from 'vitest'

import { clusterFrames, groupFrames, selectRepresentative } from '../src/slides/dedup.js'
import type { FrameRecord } from '../src/slides/types.js'

const frame = (sequenceNumber: number, fingerprint: string): FrameRecord => ({
  frameId: `frame-${sequenceNumber}`,
  sequenceNumber,
  timestamp: (sequenceNumber - 1) * 5,
  fingerprint,
  sourcePath: `/session/frames/frame_${String(sequenceNumber).padStart(5, '0')}.jpg`,
})

const framesFrom = (fingerprints: string[]) =>
  fingerprints.map((fingerprint, index) => frame(index + 1, fingerprint))

describe('clusterFrames', () => {
  it('starts a new cluster when a frame stops matching the anchor', () => {
    const clusters = clusterFrames(framesFrom(['ff', 'ff', 'fe', '00', '00']), { threshold: 0.85 })

    expect(clusters.map((cluster) => cluster.map((f) => f.sequenceNumber))).toEqual([
      [1, 2, 3],
      [4, 5],
    ])
  })

  it('compares against the first frame of the cluster, not the previous one', () => {
    // Each step differs by one bit from its neighbour, but the third drifts two bits from the anchor.
    const clusters = clusterFrames(framesFrom(['ff', 'fe', 'fc', 'f8']), { threshold: 0.85 })

    expect(clusters.map((cluster) => cluster.map((f) => f.fingerprint))).toEqual([
      ['ff', 'fe'],
      ['fc', 'f8'],
    ])
  })

  it('puts everything in one cluster at threshold 0', () => {
    const clusters = clusterFrames(framesFrom(['ff', '00', 'f0']), { threshold: 0 })
    expect(clusters).toHaveLength(1)
  })

  it('only merges identical fingerprints at threshold 1', () => {
    const clusters = clusterFrames(framesFrom(['ff', 'ff', 'fe', 'fe']), { threshold: 1 })
    expect(clusters.map((cluster) => cluster.length)).toEqual([2, 2])
  })

  it('uses the similarity function it is given', () => {
    const clusters = clusterFrames(framesFrom(['a', 'b', 'c']), {
      threshold: 0.5,
      similarity: () => 1,
    })
    expect(clusters).toHaveLength(1)
  })
})

describe('selectRepresentative', () => {
  const cluster = ['a', 'b', 'c', 'd']

  it('picks by strategy, with middle at len / 2', () => {
    expect(selectRepresentative(cluster, 'first')).toBe('a')
    expect(selectRepresentative(cluster, 'middle')).toBe('c')
    expect(selectRepresentative(cluster, 'last')).toBe('d')
    expect(selectRepresentative(['only'], 'middle')).toBe('only')
  })

  it('refuses an empty cluster', () => {
    expect(() => selectRepresentative([], 'first')).toThrow(
      'Internal error: cannot pick from an empty cluster'
    )
  })
})

describe('groupFrames', () => {
  it('numbers slides from 1 and takes the representative frame details', () => {
    const slides = groupFrames(framesFrom(['ff', 'ff', 'fe', '00', '00']), {
      threshold: 0.85,
      strategy: 'middle',
    })

    expect(slides).toEqual([
      {
        slideIndex: 1,
        representativeFrameId: 'frame-2',
        timestamp: 5,
        imagePath: '/session/frames/frame_00002.jpg',
        frameCount: 3,
        recognizedText: null,
        confidence: null,
      },
      {
        slideIndex: 2,
        representativeFrameId: 'frame-5',
        timestamp: 20,
        imagePath: '/session/frames/frame_00005.jpg',
        frameCount: 2,
        recognizedText: null,
        confidence: null,
      },
    ])
  })

  it('keeps slides in timestamp order', () => {
    const slides = groupFrames(framesFrom(['00', 'ff', '00', 'ff']), {
      threshold: 0.9,
      strategy: 'first',
    })
    expect(slides.map((slide) => slide.timestamp)).toEqual([0, 5, 10, 15])
  })

  it('turns a single frame into a single slide', () => {
    const slides = groupFrames(framesFrom(['a5']), { threshold: 0.85, strategy: 'last' })
    expect(slides.map((slide) => [slide.slideIndex, slide.representativeFrameId])).toEqual([
      [1, 'frame-1'],
    ])
  })

  it('fails with no-slides-found for an empty frame list', () => {
    expect(() => groupFrames([], { threshold: 0.85, strategy: 'middle' })).toThrow(
      'No unique slides found'
    )
  })
})
