import { PipelineError } from './pipeline-error'

/** Raised when a tag reference does not carry the release prefix. */
export class InvalidTagFormatError extends PipelineError {
  public readonly code = 'INVALID_TAG_FORMAT'
  public readonly prefix: string
  public readonly tag: string

  /**
   * @param tag - Tag reference that was rejected.
   * @param prefix - Prefix release tags must start with.
   */
  public constructor(tag: string, prefix: string) {
    super(`Tag "${tag}" does not match release prefix "${prefix}"`)
    this.name = 'InvalidTagFormatError'
    this.prefix = prefix
    this.tag = tag
  }
}
