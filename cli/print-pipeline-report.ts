import pc from 'picocolors'

import type { PipelineReport } from '../types/pipeline-report'

/**
 * Print the per-platform result of a pipeline run.
 *
 * @param report - Pipeline report.
 */
export function printPipelineReport(report: PipelineReport): void {
  console.info(pc.bold(`\nRelease ${report.version}`))
  console.info(pc.gray(report.release.url))

  for (let outcome of report.platforms.values()) {
    if (outcome.status === 'published') {
      console.info(
        `  ${pc.green('✓')} ${outcome.platform}: ${outcome.asset?.name ?? ''}`,
      )
    } else {
      console.info(
        `  ${pc.redBright('✗')} ${outcome.platform}: ` +
          `${outcome.error?.message ?? 'failed'}`,
      )
    }
  }

  for (let error of report.eventErrors) {
    let message = error instanceof Error ? error.message : String(error)
    console.info(pc.yellow(`\n⚠️  Progress output failed: ${message}`))
  }

  let failed = [...report.platforms.values()].filter(
    outcome => outcome.status === 'failed',
  ).length
  let total = report.platforms.size

  if (report.success) {
    console.info(pc.green(`\n✨ Published ${total} of ${total} platforms\n`))
  } else {
    console.info(
      pc.redBright(`\n${failed} of ${total} platforms failed to publish\n`),
    )
  }
}
