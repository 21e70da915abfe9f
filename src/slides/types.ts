import type { Outcome } from '../errors.js'

export type RepresentativeStrategy = 'first' | 'middle' | 'last'

export type VideoMetadata = {
  videoId: string
  title: string
  durationSeconds: number
  width: number | null
  height: number | null
  uploader: string | null
  uploadDate: string | null
}

export type FrameRecord = {
  frameId: string
  /** 1-based, in sampling order. */
  sequenceNumber: number
  timestamp: number
  fingerprint: string
  sourcePath: string
}

export type SlideRecord = {
  slideIndex: number
  representativeFrameId: string
  timestamp: number
  imagePath: string
  frameCount: number
  recognizedText: string | null
  confidence: number | null
}

/** Persisted per slide so a resumed run can rebuild the report without rehashing. */
export type SlideManifestEntry = {
  index: number
  fileName: string
  timestamp: number
  sequenceNumber: number
  frameCount: number
}

export type RecognizedText = {
  text: string
  confidence: number
}

export type ProbedVideo = {
  durationSeconds: number | null
  width: number | null
  height: number | null
}

export type FrameFormat = 'jpg' | 'png'

export type FetchedMetadata = {
  metadata: VideoMetadata
  ageLimit: number | null
  /** yt-dlp availability: public, unlisted, private, needs_auth, subscriber_only, ... */
  availability: string | null
}

export type DownloadedVideo = {
  filePath: string
  probe: ProbedVideo
}

export type ProgressCallback = (percent: number, detail?: string) => void

export type VideoSource = {
  fetchMetadata: (args: {
    url: string
    videoId: string
    timeoutMs: number
  }) => Promise<Outcome<FetchedMetadata>>
  download: (args: {
    url: string
    destinationDir: string
    baseName: string
    timeoutMs: number
    onProgress?: ProgressCallback | null
  }) => Promise<Outcome<DownloadedVideo>>
}

export type FrameSampler = {
  extractFrames: (args: {
    videoPath: string
    outputDir: string
    intervalSeconds: number
    format: FrameFormat
    durationSeconds: number
    timeoutMs: number
    onProgress?: ProgressCallback | null
  }) => Promise<Outcome<{ frameCount: number }>>
}

export type TextRecognizer = {
  recognize: (args: {
    imagePath: string
    languages: string[]
    timeoutMs: number
  }) => Promise<Outcome<RecognizedText>>
}
