export type { ErrorCategory, ExtractionFailure, Outcome } from './errors.js'
export { ExtractionError, isExtractionError } from './errors.js'
export type { ExtractionSettings } from './settings.js'
export { resolveExtractionSettings } from './settings.js'
export * from './slides/index.js'
export { runCli } from './run.js'
