/** Raw shape of a platform entry in the YAML config file. */
export interface PlatformEntry {
  target?: string
  strip?: boolean
  cross?: boolean
  name: string
  os?: string
}

/** Raw shape of the YAML config file; every key is optional. */
export interface ReleaseConfigFile {
  toolchain?: {
    env?: Record<string, string>
    outputRoot?: string
    native?: string
    cross?: string
    args?: string[]
  }
  platforms?: PlatformEntry[]
  repository?: string
  tagPrefix?: string
  binary?: string
}
