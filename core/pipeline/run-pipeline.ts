import type { PipelineReport } from '../../types/pipeline-report'
import type { ReleaseConfig } from '../../types/release-config'
import type { ReleaseClient } from '../../types/release-client'
import type { PipelineEvent } from '../../types/pipeline-event'
import type { PipelinePlan } from './plan-pipeline'

import { runPlatformBranch } from './run-platform-branch'
import { planPipeline } from './plan-pipeline'

/** Options for a pipeline run. */
export interface RunPipelineOptions {
  /** Receives progress events; optional. */
  onEvent?(event: PipelineEvent): void

  /** Release configuration (platforms, toolchain, prefix, binary). */
  config: ReleaseConfig

  /** Remote release operations. */
  client: ReleaseClient

  /** Result of `planPipeline(tag, config)`, when the caller already has it. */
  plan?: PipelinePlan

  /** Tag reference that triggered the run. */
  tag: string
}

/**
 * Run the release pipeline for a pushed tag.
 *
 * Resolves the version and selects a toolchain for every platform before any
 * remote call, then creates the release. Afterwards one build-then-upload
 * branch runs per platform, concurrently; a failing branch never cancels its
 * siblings and nothing already uploaded is rolled back.
 *
 * Errors thrown by `onEvent` are collected in the report's `eventErrors` and
 * do not change any platform's outcome.
 *
 * @param options - Tag, configuration, client and event sink.
 * @returns Report with one outcome per platform. `success` is false when any
 *   platform failed.
 * @throws {InvalidTagFormatError} Before any remote call.
 * @throws {MissingTargetError} Before any remote call.
 * @throws {ReleaseCreationFailedError} Before any build starts.
 */
export async function runPipeline(
  options: RunPipelineOptions,
): Promise<PipelineReport> {
  let { config, client, tag } = options
  let eventErrors: unknown[] = []

  let emit = (event: PipelineEvent): void => {
    try {
      options.onEvent?.(event)
    } catch (error) {
      eventErrors.push(error)
    }
  }

  let { version, plans } = options.plan ?? planPipeline(tag, config)
  emit({ type: 'version-resolved', version })

  let release = await client.createRelease(version)
  emit({ type: 'release-created', release })

  let outcomes = await Promise.all(
    plans.map(plan =>
      runPlatformBranch(plan, {
        binary: config.binary,
        release,
        client,
        emit,
      }),
    ),
  )

  let platforms = new Map(outcomes.map(outcome => [outcome.platform, outcome]))

  return {
    success: outcomes.every(outcome => outcome.status === 'published'),
    eventErrors,
    platforms,
    release,
    version,
  }
}
