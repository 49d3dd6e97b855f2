import type { ToolchainSettings } from './toolchain-settings'
import type { PlatformSpec } from './platform-spec'

/** Fully resolved release configuration. */
export interface ReleaseConfig {
  /** Toolchain executables, base arguments and output root. */
  toolchain: ToolchainSettings

  /** Repository slug ('owner/repo') from the config file, if set. */
  repository: string | null

  /** Platforms to build, in configuration order. */
  platforms: PlatformSpec[]

  /** Literal prefix marking release tags (e.g. 'refs/tags/v'). */
  tagPrefix: string

  /** Name of the binary produced by the toolchain. */
  binary: string
}
