import type { ToolchainSettings } from '../../types/toolchain-settings'

/** Toolchain used when the config file does not override it. */
export const DEFAULT_TOOLCHAIN: Readonly<ToolchainSettings> = {
  args: ['build', '--release'],
  env: { RUST_BACKTRACE: '1' },
  outputRoot: './target',
  native: 'cargo',
  cross: 'cross',
}
