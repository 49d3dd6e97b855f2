import { createSpinner } from 'nanospinner'
import pc from 'picocolors'

import type { PipelineEvent } from '../types/pipeline-event'

/** Renders pipeline events as spinner updates. */
export interface ProgressReporter {
  /** Handle one pipeline event. */
  handle(event: PipelineEvent): void

  /** Stop the active spinner, marking it as failed. */
  fail(text: string): void

  /** Stop the active spinner, marking it as done. */
  done(text: string): void
}

/**
 * Create a reporter that turns pipeline events into terminal progress.
 *
 * @param total - Number of platforms in the run.
 * @returns Reporter to pass as the pipeline's event sink.
 */
export function createProgressReporter(total: number): ProgressReporter {
  let spinner = createSpinner('Resolving version...').start()
  let finished = 0

  function buildingText(): string {
    return `Building and uploading ${pc.yellow(finished)}/${pc.yellow(total)} platforms...`
  }

  return {
    handle: event => {
      switch (event.type) {
        case 'version-resolved':
          spinner.update({
            text: `Creating release ${pc.cyan(event.version)}...`,
          })
          break
        case 'release-created':
          spinner.success(`Created release ${pc.cyan(event.release.tag)}`)
          spinner = createSpinner(buildingText()).start()
          break
        case 'upload-finished':
        case 'platform-failed':
          finished += 1
          spinner.update({ text: buildingText() })
          break
        case 'build-finished':
        case 'build-started':
          break
      }
    },
    fail: text => {
      spinner.error(text)
    },
    done: text => {
      spinner.success(text)
    },
  }
}
