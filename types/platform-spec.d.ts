/** Statically configured build target. */
export interface PlatformSpec {
  /** Target triple passed to the cross toolchain (e.g. 'x86_64-apple-darwin'). */
  target?: string

  /** Whether symbols are stripped from the binary after the build. */
  strip: boolean

  /** Whether the build goes through the cross-compilation toolchain. */
  cross: boolean

  /** Runner OS class the platform is built for (e.g. 'ubuntu-latest'). */
  os: string

  /** Platform name used in asset names (e.g. 'linux'). */
  name: string
}
