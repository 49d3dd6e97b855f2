/** Stable identifiers for every failure the pipeline reports. */
export type PipelineErrorCode =
  | 'RELEASE_CREATION_FAILED'
  | 'POST_PROCESS_FAILED'
  | 'INVALID_TAG_FORMAT'
  | 'MISSING_TARGET'
  | 'UPLOAD_FAILED'
  | 'BUILD_FAILED'
  | 'CONFIG_ERROR'

/** Base class for failures raised or recorded by the release pipeline. */
export abstract class PipelineError extends Error {
  public abstract readonly code: PipelineErrorCode
}

/**
 * Check whether a value is a pipeline error.
 *
 * @param value - Value to check.
 * @returns True when the value extends `PipelineError`.
 */
export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError
}
