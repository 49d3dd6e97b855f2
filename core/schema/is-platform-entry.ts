import type { PlatformEntry } from '../../types/release-config-file'

/**
 * Type guard to check if a value conforms to a platform entry of the config.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid platform entry.
 */
export function isPlatformEntry(value: unknown): value is PlatformEntry {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  if (
    !('name' in value) ||
    typeof value.name !== 'string' ||
    value.name.trim() === ''
  ) {
    return false
  }

  if ('os' in value && typeof value.os !== 'string') {
    return false
  }
  if ('target' in value && typeof value.target !== 'string') {
    return false
  }
  if ('cross' in value && typeof value.cross !== 'boolean') {
    return false
  }
  return !('strip' in value) || typeof value.strip === 'boolean'
}
