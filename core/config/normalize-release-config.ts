import type { ReleaseConfigFile } from '../../types/release-config-file'
import type { ReleaseConfig } from '../../types/release-config'
import type { PlatformSpec } from '../../types/platform-spec'

import { DEFAULT_TOOLCHAIN } from '../toolchain/default-toolchain'
import { DEFAULT_BINARY_NAME, DEFAULT_TAG_PREFIX } from '../constants'
import { ConfigError } from '../errors/config-error'
import { DEFAULT_PLATFORMS } from './default-platforms'

/**
 * Merge a parsed config file over the defaults.
 *
 * Platform entries default to `cross: false` and `strip: true`; the OS class
 * defaults to the platform name. Toolchain environment variables are merged
 * over the default ones.
 *
 * @param file - Validated config file contents.
 * @returns Fully resolved configuration.
 * @throws {ConfigError} When platform names repeat, the platform list is
 *   empty, the binary name is blank or the tag prefix is empty.
 */
export function normalizeReleaseConfig(file: ReleaseConfigFile): ReleaseConfig {
  let platforms: PlatformSpec[] = file.platforms
    ? file.platforms.map(entry => {
        let name = entry.name.trim()
        return {
          ...(entry.target ? { target: entry.target } : {}),
          cross: entry.cross ?? false,
          strip: entry.strip ?? true,
          os: entry.os ?? name,
          name,
        }
      })
    : DEFAULT_PLATFORMS.map(platform => ({ ...platform }))

  if (platforms.length === 0) {
    throw new ConfigError('At least one platform must be configured')
  }

  let seen = new Set<string>()
  for (let { name } of platforms) {
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate platform name: ${name}`)
    }
    seen.add(name)
  }

  let binary = (file.binary ?? DEFAULT_BINARY_NAME).trim()
  if (binary === '') {
    throw new ConfigError('Binary name must not be empty')
  }

  let tagPrefix = file.tagPrefix ?? DEFAULT_TAG_PREFIX
  if (tagPrefix === '') {
    throw new ConfigError('Tag prefix must not be empty')
  }

  return {
    toolchain: {
      outputRoot: file.toolchain?.outputRoot ?? DEFAULT_TOOLCHAIN.outputRoot,
      native: file.toolchain?.native ?? DEFAULT_TOOLCHAIN.native,
      cross: file.toolchain?.cross ?? DEFAULT_TOOLCHAIN.cross,
      env: { ...DEFAULT_TOOLCHAIN.env, ...file.toolchain?.env },
      args: [...(file.toolchain?.args ?? DEFAULT_TOOLCHAIN.args)],
    },
    repository: file.repository ?? null,
    platforms,
    tagPrefix,
    binary,
  }
}
