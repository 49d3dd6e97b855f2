/**
 * Invocation parameters for building one platform.
 *
 * Produced by `selectToolchain`, consumed by `runBuild`. Computing a plan never
 * invokes a tool.
 */
export interface ToolchainPlan {
  /** Extra environment variables for the build command. */
  env: Record<string, string>

  /** Directory holding the `release/` build output for this platform. */
  outputDirectory: string

  /** Executable to run (native or cross toolchain). */
  executable: string

  /** Whether the produced binary is stripped. */
  strip: boolean

  /** Platform name the plan was selected for. */
  platform: string

  /** Ordered arguments passed to the executable. */
  args: string[]
}
