import { PipelineError } from './pipeline-error'

/** Raised when an asset cannot be read or the upload is rejected. */
export class UploadFailedError extends PipelineError {
  public readonly code = 'UPLOAD_FAILED'
  public readonly status: number | null
  public readonly platform: string
  public readonly detail: string

  /**
   * @param platform - Platform whose asset failed to upload.
   * @param status - HTTP status, or null for local read errors.
   * @param detail - Message reported by the API or the file system.
   */
  public constructor(platform: string, status: number | null, detail: string) {
    super(
      `Upload failed for ${platform}` +
        `${status === null ? '' : ` (${status})`}: ${detail}`,
    )
    this.name = 'UploadFailedError'
    this.platform = platform
    this.status = status
    this.detail = detail
  }
}
