import pc from 'picocolors'

import type { ProgressReporter } from './create-progress-reporter'

import { confirmPublish } from '../core/interactive/confirm-publish'
import { createGitHubClient } from '../core/api/create-github-client'
import { loadReleaseConfig } from '../core/config/load-release-config'
import { resolveRepository } from '../core/config/resolve-repository'
import { createProgressReporter } from './create-progress-reporter'
import { printPipelineReport } from './print-pipeline-report'
import { planPipeline } from '../core/pipeline/plan-pipeline'
import { runPipeline } from '../core/pipeline/run-pipeline'
import { resolveTriggerTag } from './resolve-trigger-tag'
import { filterPlatforms } from './filter-platforms'
import { printDryRun } from './print-dry-run'

/** Options accepted by the release command. */
export interface ReleaseCommandOptions {
  /** Platform names to build (repeatable, comma-separated). */
  platform?: string[] | string

  /** Preview the plan without building or publishing. */
  dryRun: boolean

  /** Path to the release config file. */
  config?: string

  /** Repository slug override ('owner/repo'). */
  repo?: string

  /** Skip the confirmation prompt. */
  yes: boolean
}

/**
 * Run the release command and report the result on the terminal.
 *
 * Every platform's outcome is printed before a failure status is returned.
 *
 * @param tag - Tag reference from the command line, if any.
 * @param options - Parsed command options.
 * @returns Exit code: 1 when a step before the builds fails, the user declines
 *   the prompt or any platform fails; 0 otherwise.
 */
export async function runRelease(
  tag: undefined | string,
  options: ReleaseCommandOptions,
): Promise<number> {
  console.info(pc.cyan('\n🚢 tagship\n'))

  let reporter: ProgressReporter | null = null

  try {
    let loaded = await loadReleaseConfig(process.cwd(), options.config)
    let config = {
      ...loaded,
      platforms: filterPlatforms(loaded.platforms, options.platform),
    }

    /** Resolve everything that can fail before touching the network. */
    let triggerTag = resolveTriggerTag(tag)
    let plan = planPipeline(triggerTag, config)

    if (options.dryRun) {
      printDryRun(plan, config.binary)
      return 0
    }

    let repository = resolveRepository(options.repo, config.repository)

    if (!options.yes && process.stdin.isTTY && !process.env['CI']) {
      let confirmed = await confirmPublish(plan.version, plan.plans)
      if (!confirmed) {
        console.info(pc.gray('\nRelease cancelled'))
        return 1
      }
    }

    let progress = createProgressReporter(plan.plans.length)
    reporter = progress

    let report = await runPipeline({
      client: createGitHubClient({ repository }),
      onEvent: event => progress.handle(event),
      tag: triggerTag,
      config,
      plan,
    })

    if (report.success) {
      progress.done('All platforms published')
    } else {
      progress.fail('Some platforms failed')
    }

    printPipelineReport(report)

    return report.success ? 0 : 1
  } catch (error) {
    reporter?.fail('Failed')
    console.error(
      pc.redBright('\nError:'),
      error instanceof Error ? error.message : String(error),
    )
    return 1
  }
}
