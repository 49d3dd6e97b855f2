import type { PlatformOutcome } from './platform-outcome'
import type { ReleaseHandle } from './release-handle'

/** Result of a pipeline run that got past release creation. */
export interface PipelineReport {
  /** Outcome per platform, keyed by platform name. */
  platforms: Map<string, PlatformOutcome>

  /** Errors thrown by the event sink; they never affect outcomes. */
  eventErrors: unknown[]

  /** Release the assets were attached to. */
  release: ReleaseHandle

  /** True when every platform was published. */
  success: boolean

  /** Version derived from the tag. */
  version: string
}
