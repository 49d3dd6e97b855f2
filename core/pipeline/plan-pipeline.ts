import type { ReleaseConfig } from '../../types/release-config'
import type { ToolchainPlan } from '../../types/toolchain-plan'

import { selectToolchain } from '../toolchain/select-toolchain'
import { resolveVersion } from '../version/resolve-version'

/** Everything decided before the first remote call. */
export interface PipelinePlan {
  /** One plan per configured platform, in configuration order. */
  plans: ToolchainPlan[]

  /** Version derived from the tag. */
  version: string
}

/**
 * Resolve the version and toolchain plans without running anything.
 *
 * Used by the pipeline before creating the release and by the CLI for dry
 * runs.
 *
 * @param tag - Tag reference that triggered the run.
 * @param config - Release configuration.
 * @returns Version and per-platform plans.
 */
export function planPipeline(tag: string, config: ReleaseConfig): PipelinePlan {
  let version = resolveVersion(tag, config.tagPrefix)
  let plans = config.platforms.map(platform =>
    selectToolchain(platform, config.toolchain),
  )
  return { version, plans }
}
