import { PipelineError } from './pipeline-error'

/** Raised when the hosting API refuses to create a release. */
export class ReleaseCreationFailedError extends PipelineError {
  public readonly code = 'RELEASE_CREATION_FAILED'
  public readonly status: number | null
  public readonly version: string
  public readonly detail: string

  /**
   * @param version - Version the release was requested for.
   * @param status - HTTP status, or null when no response was received.
   * @param detail - Message reported by the API or the transport.
   */
  public constructor(version: string, status: number | null, detail: string) {
    super(
      `Failed to create release ${version}` +
        `${status === null ? '' : ` (${status})`}: ${detail}`,
    )
    this.name = 'ReleaseCreationFailedError'
    this.version = version
    this.status = status
    this.detail = detail
  }
}
