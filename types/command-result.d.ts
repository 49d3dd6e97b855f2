/** Outcome of running an external command to completion. */
export interface CommandResult {
  /** Exit code, or null when the process could not be started or was killed. */
  exitCode: number | null

  /** Combined stdout and stderr. */
  output: string
}
