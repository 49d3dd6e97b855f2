import type { PipelineError } from '../core/errors/pipeline-error'
import type { AssetAck } from './asset-ack'

/** Terminal state of one platform branch. */
export interface PlatformOutcome {
  /** Whether the platform's asset reached the release. */
  status: 'published' | 'failed'

  /** Failure that ended the branch, when `status` is 'failed'. */
  error?: PipelineError

  /** Uploaded asset, when `status` is 'published'. */
  asset?: AssetAck

  /** Platform name. */
  platform: string
}
