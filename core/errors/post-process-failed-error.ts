import { PipelineError } from './pipeline-error'

/** Raised when stripping a successfully built binary fails. */
export class PostProcessFailedError extends PipelineError {
  public readonly code = 'POST_PROCESS_FAILED'
  public readonly exitCode: number | null
  public readonly binaryPath: string
  public readonly platform: string

  /**
   * @param platform - Platform whose binary could not be processed.
   * @param binaryPath - Binary the strip step ran on.
   * @param exitCode - Exit code of the strip command.
   */
  public constructor(
    platform: string,
    binaryPath: string,
    exitCode: number | null,
  ) {
    super(
      `Stripping ${binaryPath} failed for ${platform}` +
        `${exitCode === null ? '' : ` (exit code ${exitCode})`}`,
    )
    this.name = 'PostProcessFailedError'
    this.binaryPath = binaryPath
    this.exitCode = exitCode
    this.platform = platform
  }
}
