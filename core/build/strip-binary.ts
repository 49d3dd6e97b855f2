import { PostProcessFailedError } from '../errors/post-process-failed-error'
import { STRIP_EXECUTABLE } from '../constants'
import { runCommand } from './run-command'

/**
 * Strip debug symbols from a binary in place.
 *
 * @param platform - Platform the binary belongs to.
 * @param binaryPath - Binary to strip.
 * @throws {PostProcessFailedError} When `strip` cannot run or exits nonzero.
 */
export async function stripBinary(
  platform: string,
  binaryPath: string,
): Promise<void> {
  let { exitCode } = await runCommand(STRIP_EXECUTABLE, [binaryPath])
  if (exitCode !== 0) {
    throw new PostProcessFailedError(platform, binaryPath, exitCode)
  }
}
