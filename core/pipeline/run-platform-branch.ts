import type { PlatformOutcome } from '../../types/platform-outcome'
import type { ReleaseClient } from '../../types/release-client'
import type { ReleaseHandle } from '../../types/release-handle'
import type { PipelineEvent } from '../../types/pipeline-event'
import type { ToolchainPlan } from '../../types/toolchain-plan'

import { UploadFailedError } from '../errors/upload-failed-error'
import { BuildFailedError } from '../errors/build-failed-error'
import { isPipelineError } from '../errors/pipeline-error'
import { createReleaseAsset } from './create-release-asset'
import { runBuild } from '../build/run-build'

/** Inputs shared read-only by every platform branch. */
export interface PlatformBranchContext {
  /** Receives progress events; must not throw. */
  emit(event: PipelineEvent): void

  /** Remote release operations. */
  client: ReleaseClient

  /** Release to upload into. */
  release: ReleaseHandle

  /** Name of the binary produced by the toolchain. */
  binary: string
}

/**
 * Build one platform and upload its binary.
 *
 * The upload only starts after the build and post-processing succeeded. The
 * returned promise never rejects: every failure, expected or not, becomes a
 * failed outcome so sibling branches are unaffected.
 *
 * @param plan - Toolchain plan for the platform.
 * @param context - Release, client, binary name and event sink.
 * @returns Terminal outcome of the branch.
 */
export async function runPlatformBranch(
  plan: ToolchainPlan,
  context: PlatformBranchContext,
): Promise<PlatformOutcome> {
  let { platform } = plan
  let stage: 'upload' | 'build' = 'build'

  try {
    context.emit({ type: 'build-started', plan })
    let result = await runBuild(plan, context.binary)
    if (!result.success) {
      return fail(context, platform, result.error)
    }
    context.emit({
      binaryPath: result.binaryPath,
      type: 'build-finished',
      platform,
    })

    stage = 'upload'
    let asset = await context.client.uploadAsset(
      context.release,
      createReleaseAsset(context.binary, platform, result.binaryPath),
    )
    context.emit({ type: 'upload-finished', platform, asset })

    return { status: 'published', platform, asset }
  } catch (error) {
    if (isPipelineError(error)) {
      return fail(context, platform, error)
    }
    let message = error instanceof Error ? error.message : String(error)
    return fail(
      context,
      platform,
      stage === 'upload'
        ? new UploadFailedError(platform, null, message)
        : new BuildFailedError(platform, null, message),
    )
  }
}

function fail(
  context: PlatformBranchContext,
  platform: string,
  error: NonNullable<PlatformOutcome['error']>,
): PlatformOutcome {
  context.emit({ type: 'platform-failed', platform, error })
  return { status: 'failed', platform, error }
}
