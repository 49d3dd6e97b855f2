import { stat } from 'node:fs/promises'
import { join } from 'node:path'

import type { ToolchainPlan } from '../../types/toolchain-plan'
import type { BuildResult } from '../../types/build-result'

import { PostProcessFailedError } from '../errors/post-process-failed-error'
import { BuildFailedError } from '../errors/build-failed-error'
import { RELEASE_DIRECTORY } from '../constants'
import { stripBinary } from './strip-binary'
import { tailOutput } from './tail-output'
import { runCommand } from './run-command'

/**
 * Build the release binary for one platform and post-process it.
 *
 * The binary is expected at `<outputDirectory>/release/<binaryName>`. Failures
 * are returned as an unsuccessful result rather than thrown, so that one
 * platform never interrupts its siblings.
 *
 * @param plan - Toolchain invocation for the platform.
 * @param binaryName - Name of the binary the toolchain produces.
 * @returns Build result; failed when compilation, the output check or
 *   stripping fails.
 */
export async function runBuild(
  plan: ToolchainPlan,
  binaryName: string,
): Promise<BuildResult> {
  let { outputDirectory, executable, platform, args } = plan
  let binaryPath = join(outputDirectory, RELEASE_DIRECTORY, binaryName)

  let { exitCode, output } = await runCommand(executable, args, {
    env: plan.env,
  })
  if (exitCode !== 0) {
    let reason =
      exitCode === null
        ? `${executable} could not be run`
        : `${executable} exited with code ${exitCode}`
    return {
      error: new BuildFailedError(platform, exitCode, reason, tailOutput(output)),
      success: false,
      binaryPath,
      platform,
    }
  }

  if (!(await isFile(binaryPath))) {
    return {
      error: new BuildFailedError(
        platform,
        exitCode,
        `binary not found at ${binaryPath}`,
        tailOutput(output),
      ),
      success: false,
      binaryPath,
      platform,
    }
  }

  if (plan.strip) {
    try {
      await stripBinary(platform, binaryPath)
    } catch (error) {
      if (error instanceof PostProcessFailedError) {
        return { success: false, binaryPath, platform, error }
      }
      throw error
    }
  }

  return { success: true, binaryPath, platform }
}

async function isFile(path: string): Promise<boolean> {
  try {
    let stats = await stat(path)
    return stats.isFile()
  } catch {
    return false
  }
}
