import type { PostProcessFailedError } from '../core/errors/post-process-failed-error'
import type { BuildFailedError } from '../core/errors/build-failed-error'

/** Build produced a (stripped, when required) binary. */
interface BuildSuccess {
  /** Path to the finished binary. */
  binaryPath: string

  /** Platform name. */
  platform: string

  success: true
}

/** Build or post-processing failed; the binary must not be published. */
interface BuildFailure {
  /** Reason the build result is invalid. */
  error: PostProcessFailedError | BuildFailedError

  /** Path where the binary was expected. */
  binaryPath: string

  /** Platform name. */
  platform: string

  success: false
}

/** Per-platform outcome of a build job. */
export type BuildResult = BuildFailure | BuildSuccess
