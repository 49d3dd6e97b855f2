import { PipelineError } from './pipeline-error'

/** Raised when a cross-compiled platform has no target triple. */
export class MissingTargetError extends PipelineError {
  public readonly code = 'MISSING_TARGET'
  public readonly platform: string

  /** @param platform - Platform name lacking a target. */
  public constructor(platform: string) {
    super(`Platform "${platform}" requires cross compilation but has no target`)
    this.name = 'MissingTargetError'
    this.platform = platform
  }
}
