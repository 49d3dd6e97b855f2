/** Toolchain executables and arguments shared by every platform. */
export interface ToolchainSettings {
  /** Environment variables set for the build command. */
  env: Record<string, string>

  /** Root directory the toolchain writes build output to. */
  outputRoot: string

  /** Cross-compilation executable. */
  cross: string

  /** Native toolchain executable. */
  native: string

  /** Base build arguments, before any target selection. */
  args: string[]
}
