import type { PlatformSpec } from '../types/platform-spec'

import { ConfigError } from '../core/errors/config-error'

/**
 * Restrict configured platforms to the names given with `--platform`.
 *
 * Accepts repeated flags and comma-separated lists.
 *
 * @param platforms - Configured platforms.
 * @param requested - Raw flag value(s).
 * @returns Selected platforms in configuration order; all when no flag given.
 * @throws {ConfigError} When a requested name is not configured.
 */
export function filterPlatforms(
  platforms: PlatformSpec[],
  requested: undefined | string[] | string,
): PlatformSpec[] {
  let raw: string[] = []
  if (Array.isArray(requested)) {
    raw.push(...requested)
  } else if (typeof requested === 'string') {
    raw.push(requested)
  }

  let names = new Set(
    raw
      .flatMap(item => item.split(','))
      .map(item => item.trim())
      .filter(Boolean),
  )

  if (names.size === 0) {
    return platforms
  }

  let known = new Set(platforms.map(platform => platform.name))
  for (let name of names) {
    if (!known.has(name)) {
      throw new ConfigError(`Unknown platform: ${name}`)
    }
  }

  return platforms.filter(platform => names.has(platform.name))
}
