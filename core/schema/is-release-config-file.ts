import type { ReleaseConfigFile } from '../../types/release-config-file'

import { isPlatformEntry } from './is-platform-entry'
import { isStringRecord } from './is-string-record'
import { isStringArray } from './is-string-array'

/**
 * Type guard to check if a parsed YAML document is a release config.
 *
 * Every key is optional; present keys must have the right type.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid config file structure.
 */
export function isReleaseConfigFile(
  value: unknown,
): value is ReleaseConfigFile {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  for (let key of ['binary', 'repository', 'tagPrefix'] as const) {
    if (key in value && typeof Reflect.get(value, key) !== 'string') {
      return false
    }
  }

  if (
    'platforms' in value &&
    !(Array.isArray(value.platforms) && value.platforms.every(isPlatformEntry))
  ) {
    return false
  }

  if (!('toolchain' in value)) {
    return true
  }

  let { toolchain } = value
  if (
    toolchain === null ||
    typeof toolchain !== 'object' ||
    Array.isArray(toolchain)
  ) {
    return false
  }

  for (let key of ['native', 'cross', 'outputRoot'] as const) {
    if (key in toolchain && typeof Reflect.get(toolchain, key) !== 'string') {
      return false
    }
  }

  if ('env' in toolchain && !isStringRecord(toolchain.env)) {
    return false
  }

  return !('args' in toolchain) || isStringArray(toolchain.args)
}
