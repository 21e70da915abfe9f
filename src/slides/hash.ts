import { createExtractionError, fail, isExtractionError, type Outcome, succeed } from '../errors.js'

export type HashAlgorithm = 'average' | 'difference' | 'perceptual'

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['average', 'difference', 'perceptual']

/** Returns `width * height` 8-bit luma samples, row-major. */
export type GrayscaleSampler = (args: {
  imagePath: string
  width: number
  height: number
}) => Promise<Uint8Array>

export type HashEngine = {
  algorithm: HashAlgorithm
  gridSize: number
  fingerprint: (imagePath: string, meta: { timestamp: number }) => Promise<Outcome<string>>
  similarity: (a: string, b: string) => number
}

const DEFAULT_GRID_SIZE = 8
const PERCEPTUAL_SAMPLE_SIZE = 32

export function bitsToHex(bits: ArrayLike<number>): string {
  let hex = ''
  for (let i = 0; i < bits.length; i += 4) {
    let nibble = 0
    for (let j = 0; j < 4; j += 1) {
      nibble = (nibble << 1) | (i + j < bits.length && bits[i + j] ? 1 : 0)
    }
    hex += nibble.toString(16)
  }
  return hex
}

function buildAverageBits(pixels: Uint8Array): Uint8Array {
  let sum = 0
  for (const value of pixels) sum += value
  const avg = pixels.length === 0 ? 0 : sum / pixels.length
  const bits = new Uint8Array(pixels.length)
  for (let i = 0; i < pixels.length; i += 1) {
    bits[i] = (pixels[i] ?? 0) >= avg ? 1 : 0
  }
  return bits
}

export function averageHash(pixels: Uint8Array): string {
  return bitsToHex(buildAverageBits(pixels))
}

/** Expects `(size + 1) * size` samples; one bit per horizontal neighbour pair. */
export function differenceHash(pixels: Uint8Array, size: number): string {
  const rowWidth = size + 1
  const bits = new Uint8Array(size * size)
  for (let y = 0; y < size; y += 1) {
    for (let x = 0; x < size; x += 1) {
      const left = pixels[y * rowWidth + x] ?? 0
      const right = pixels[y * rowWidth + x + 1] ?? 0
      bits[y * size + x] = left >= right ? 1 : 0
    }
  }
  return bitsToHex(bits)
}

export function boxDownsample(
  pixels: Uint8Array,
  { from, to }: { from: number; to: number }
): Uint8Array {
  const out = new Uint8Array(to * to)
  const block = from / to
  for (let y = 0; y < to; y += 1) {
    const y0 = Math.floor(y * block)
    const y1 = Math.max(y0 + 1, Math.floor((y + 1) * block))
    for (let x = 0; x < to; x += 1) {
      const x0 = Math.floor(x * block)
      const x1 = Math.max(x0 + 1, Math.floor((x + 1) * block))
      let sum = 0
      let count = 0
      for (let sy = y0; sy < y1; sy += 1) {
        for (let sx = x0; sx < x1; sx += 1) {
          sum += pixels[sy * from + sx] ?? 0
          count += 1
        }
      }
      out[y * to + x] = Math.round(sum / count)
    }
  }
  return out
}

export function perceptualHash(pixels: Uint8Array, size: number): string {
  return averageHash(boxDownsample(pixels, { from: PERCEPTUAL_SAMPLE_SIZE, to: size }))
}

function nibbleAt(value: string, index: number): number {
  const parsed = Number.parseInt(value.charAt(index), 16)
  return Number.isNaN(parsed) ? 0 : parsed
}

function popcount4(value: number): number {
  let count = 0
  for (let v = value; v > 0; v >>= 1) count += v & 1
  return count
}

/**
 * One minus the normalized Hamming distance of two hex fingerprints.
 * Unequal lengths never match; two empty fingerprints are identical.
 */
export function hashSimilarity(a: string, b: string): number {
  if (a.length !== b.length) return 0
  if (a.length === 0) return 1
  let differing = 0
  for (let i = 0; i < a.length; i += 1) {
    differing += popcount4(nibbleAt(a, i) ^ nibbleAt(b, i))
  }
  return 1 - differing / (a.length * 4)
}

function sampleDimensions(algorithm: HashAlgorithm, size: number) {
  switch (algorithm) {
    case 'average':
      return { width: size, height: size }
    case 'difference':
      return { width: size + 1, height: size }
    case 'perceptual':
      return { width: PERCEPTUAL_SAMPLE_SIZE, height: PERCEPTUAL_SAMPLE_SIZE }
  }
}

export function computeFingerprint(
  algorithm: HashAlgorithm,
  pixels: Uint8Array,
  size: number
): string {
  switch (algorithm) {
    case 'average':
      return averageHash(pixels)
    case 'difference':
      return differenceHash(pixels, size)
    case 'perceptual':
      return perceptualHash(pixels, size)
  }
}

export function createHashEngine({
  sampler,
  algorithm = 'perceptual',
  gridSize = DEFAULT_GRID_SIZE,
}: {
  sampler: GrayscaleSampler
  algorithm?: HashAlgorithm
  gridSize?: number
}): HashEngine {
  const { width, height } = sampleDimensions(algorithm, gridSize)
  const expected = width * height

  const fingerprint = async (
    imagePath: string,
    { timestamp }: { timestamp: number }
  ): Promise<Outcome<string>> => {
    let pixels: Uint8Array
    try {
      pixels = await sampler({ imagePath, width, height })
    } catch (error) {
      // Tool-level failures (e.g. missing ffmpeg) are not the frame's fault.
      if (isExtractionError(error)) return fail(error)
      const reason = error instanceof Error ? error.message : String(error)
      return fail(createExtractionError({ kind: 'corrupt-frame', timestamp, reason }, error))
    }
    if (pixels.length < expected) {
      return fail(
        createExtractionError({
          kind: 'corrupt-frame',
          timestamp,
          reason: `expected ${expected} samples, got ${pixels.length}`,
        })
      )
    }
    return succeed(computeFingerprint(algorithm, pixels.subarray(0, expected), gridSize))
  }

  return { algorithm, gridSize, fingerprint, similarity: hashSimilarity }
}
