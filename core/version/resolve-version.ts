import { InvalidTagFormatError } from '../errors/invalid-tag-format-error'
import { DEFAULT_TAG_PREFIX } from '../constants'

/**
 * Derive the release version from a pushed tag reference.
 *
 * Strips exactly `prefix` and returns the remainder unchanged, so
 * `refs/tags/v1.2.3` becomes `1.2.3`.
 *
 * @param tag - Raw tag reference from the trigger.
 * @param prefix - Literal prefix marking release tags.
 * @returns Canonical version string.
 * @throws {InvalidTagFormatError} When the tag lacks the prefix or nothing
 *   follows it.
 */
export function resolveVersion(
  tag: string,
  prefix: string = DEFAULT_TAG_PREFIX,
): string {
  if (!tag.startsWith(prefix)) {
    throw new InvalidTagFormatError(tag, prefix)
  }

  let version = tag.slice(prefix.length)
  if (version === '') {
    throw new InvalidTagFormatError(tag, prefix)
  }

  return version
}
