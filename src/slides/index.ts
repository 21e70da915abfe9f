export type { Checkpoint, CheckpointStatus, PipelineStage } from './checkpoint.js'
export {
  advance,
  CHECKPOINT_STATUSES,
  createCheckpoint,
  loadCheckpoint,
  nextStage,
  parseCheckpoint,
  saveCheckpoint,
} from './checkpoint.js'
export { clusterFrames, groupFrames, selectRepresentative } from './dedup.js'
export type { GrayscaleSampler, HashAlgorithm, HashEngine } from './hash.js'
export { createHashEngine, hashSimilarity } from './hash.js'
export type { MemoryGuard, MemoryUsage } from './memory.js'
export { createMemoryGuard } from './memory.js'
export type { ExtractionResult, PipelineCollaborators, RunExtractionArgs } from './pipeline.js'
export { runExtraction } from './pipeline.js'
export { renderReport } from './report.js'
export type { RetryPolicy } from './retry.js'
export { computeBackoffMs, DEFAULT_RETRY_POLICY, shouldRetry } from './retry.js'
export type { VideoLocator } from './source.js'
export { createUrlValidator } from './source.js'
export type {
  FrameRecord,
  FrameSampler,
  RecognizedText,
  SlideRecord,
  TextRecognizer,
  VideoMetadata,
  VideoSource,
} from './types.js'
