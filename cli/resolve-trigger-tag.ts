import { ConfigError } from '../core/errors/config-error'

/**
 * Pick the tag reference that triggered the release.
 *
 * Falls back to `GITHUB_REF`, which GitHub Actions sets on tag pushes.
 *
 * @param argument - Positional CLI argument, if given.
 * @returns Tag reference.
 * @throws {ConfigError} When neither source provides a tag.
 */
export function resolveTriggerTag(argument: undefined | string): string {
  let tag = argument?.trim() || process.env['GITHUB_REF']?.trim()
  if (!tag) {
    throw new ConfigError('No tag given. Pass it as an argument or set GITHUB_REF')
  }
  return tag
}
