import { join } from 'node:path'

import type { ToolchainSettings } from '../../types/toolchain-settings'
import type { ToolchainPlan } from '../../types/toolchain-plan'
import type { PlatformSpec } from '../../types/platform-spec'

import { MissingTargetError } from '../errors/missing-target-error'
import { DEFAULT_TOOLCHAIN } from './default-toolchain'

/**
 * Choose the toolchain invocation for a platform.
 *
 * Cross-compiled platforms use the cross executable with `--target <triple>`
 * appended and build into `<outputRoot>/<triple>`. Native platforms use the
 * native executable and build into `<outputRoot>`, ignoring any target.
 *
 * @param platform - Platform to build.
 * @param settings - Executables, base arguments, environment and output root.
 * @returns Plan describing how to invoke the build. Nothing is executed.
 * @throws {MissingTargetError} When `cross` is set without a target triple.
 */
export function selectToolchain(
  platform: PlatformSpec,
  settings: ToolchainSettings = DEFAULT_TOOLCHAIN,
): ToolchainPlan {
  if (!platform.cross) {
    return {
      outputDirectory: settings.outputRoot,
      executable: settings.native,
      platform: platform.name,
      strip: platform.strip,
      args: [...settings.args],
      env: { ...settings.env },
    }
  }

  let { target } = platform
  if (!target) {
    throw new MissingTargetError(platform.name)
  }

  return {
    outputDirectory: join(settings.outputRoot, target),
    args: [...settings.args, '--target', target],
    executable: settings.cross,
    platform: platform.name,
    env: { ...settings.env },
    strip: platform.strip,
  }
}
