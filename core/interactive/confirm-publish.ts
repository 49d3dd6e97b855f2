import enquirer from 'enquirer'
import pc from 'picocolors'

import type { ToolchainPlan } from '../../types/toolchain-plan'

/** Answer shape returned by the confirmation prompt. */
interface ConfirmResult {
  proceed: boolean
}

/**
 * Ask the user to confirm publishing a release.
 *
 * A cancelled prompt (Ctrl+C) counts as a refusal.
 *
 * @param version - Version about to be released.
 * @param plans - Platforms that will be built.
 * @returns True when the user agreed.
 */
export async function confirmPublish(
  version: string,
  plans: ToolchainPlan[],
): Promise<boolean> {
  let platforms = plans.map(plan => plan.platform).join(', ')

  try {
    let { proceed } = await enquirer.prompt<ConfirmResult>({
      message: `Publish release ${pc.cyan(version)} for ${platforms}?`,
      name: 'proceed',
      type: 'confirm',
      initial: false,
    })
    return proceed
  } catch {
    return false
  }
}
