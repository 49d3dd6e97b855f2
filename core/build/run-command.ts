import { spawn } from 'node:child_process'

import type { CommandResult } from '../../types/command-result'

/** Options for running an external command. */
interface RunCommandOptions {
  /** Extra environment variables merged over the current environment. */
  env?: Record<string, string>
}

/**
 * Run an external command to completion and capture its output.
 *
 * Never rejects: a process that cannot be spawned (e.g. the executable is not
 * installed) resolves with a null exit code and the spawn error message as
 * output.
 *
 * @param executable - Command to run.
 * @param args - Arguments passed to the command.
 * @param options - Environment overrides.
 * @returns Exit code and combined stdout/stderr.
 */
export function runCommand(
  executable: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  return new Promise(resolve => {
    let chunks: string[] = []
    let settled = false

    function finish(result: CommandResult): void {
      if (!settled) {
        settled = true
        resolve(result)
      }
    }

    let child = spawn(executable, args, {
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    child.stdout?.setEncoding('utf8')
    child.stderr?.setEncoding('utf8')
    child.stdout?.on('data', (chunk: string) => chunks.push(chunk))
    child.stderr?.on('data', (chunk: string) => chunks.push(chunk))

    child.once('error', error => {
      finish({ output: error.message, exitCode: null })
    })

    child.once('close', code => {
      finish({ output: chunks.join(''), exitCode: code })
    })
  })
}
