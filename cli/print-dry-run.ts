import pc from 'picocolors'

import type { PipelinePlan } from '../core/pipeline/plan-pipeline'

import { createReleaseAsset } from '../core/pipeline/create-release-asset'

/**
 * Print what a run would do without building or publishing.
 *
 * @param plan - Version and per-platform toolchain plans.
 * @param binary - Name of the binary.
 */
export function printDryRun(plan: PipelinePlan, binary: string): void {
  console.info(pc.yellow('\n📋 Dry Run - Nothing will be built or published\n'))
  console.info(`Release: ${pc.cyan(plan.version)}\n`)

  for (let toolchain of plan.plans) {
    let asset = createReleaseAsset(binary, toolchain.platform, '')
    console.info(
      `${pc.cyan(toolchain.platform)}:\n` +
        `  ${toolchain.executable} ${toolchain.args.join(' ')}\n` +
        `  output: ${toolchain.outputDirectory}\n` +
        `  strip: ${toolchain.strip ? 'yes' : 'no'}\n` +
        `  asset: ${asset.name}\n`,
    )
  }
}
