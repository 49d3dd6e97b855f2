import type { PipelineError } from '../core/errors/pipeline-error'
import type { ReleaseHandle } from './release-handle'
import type { ToolchainPlan } from './toolchain-plan'
import type { AssetAck } from './asset-ack'

/** Progress notification emitted while the pipeline runs. */
export type PipelineEvent =
  | { type: 'platform-failed'; error: PipelineError; platform: string }
  | { type: 'upload-finished'; platform: string; asset: AssetAck }
  | { type: 'release-created'; release: ReleaseHandle }
  | { type: 'build-finished'; binaryPath: string; platform: string }
  | { type: 'version-resolved'; version: string }
  | { type: 'build-started'; plan: ToolchainPlan }
