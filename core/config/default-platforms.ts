import type { PlatformSpec } from '../../types/platform-spec'

/** Platforms built when the config file does not list any. */
export const DEFAULT_PLATFORMS: readonly PlatformSpec[] = [
  {
    target: 'x86_64-unknown-linux-musl',
    os: 'ubuntu-latest',
    name: 'linux',
    cross: true,
    strip: true,
  },
  {
    target: 'x86_64-apple-darwin',
    os: 'macos-latest',
    name: 'macos',
    cross: true,
    strip: true,
  },
]
