import { PipelineError } from './pipeline-error'

/** Raised when configuration cannot be read or is invalid. */
export class ConfigError extends PipelineError {
  public readonly code = 'CONFIG_ERROR'

  /**
   * @param message - What is wrong with the configuration.
   * @param options - Standard error options (e.g. `cause`).
   */
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigError'
  }
}
