import { PipelineError } from './pipeline-error'

/** Raised when the toolchain exits nonzero or produces no binary. */
export class BuildFailedError extends PipelineError {
  public readonly code = 'BUILD_FAILED'
  public readonly exitCode: number | null
  public readonly platform: string
  public readonly output: string

  /**
   * @param platform - Platform that failed to build.
   * @param exitCode - Toolchain exit code; null when it could not run.
   * @param reason - Short description of the failure.
   * @param output - Tail of the toolchain output.
   */
  public constructor(
    platform: string,
    exitCode: number | null,
    reason: string,
    output: string = '',
  ) {
    super(`Build failed for ${platform}: ${reason}`)
    this.name = 'BuildFailedError'
    this.exitCode = exitCode
    this.platform = platform
    this.output = output
  }
}
