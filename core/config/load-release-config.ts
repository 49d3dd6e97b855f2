import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { parse } from 'yaml'

import type { ReleaseConfig } from '../../types/release-config'

import { isReleaseConfigFile } from '../schema/is-release-config-file'
import { normalizeReleaseConfig } from './normalize-release-config'
import { ConfigError } from '../errors/config-error'
import { CONFIG_FILE_NAME } from '../constants'

/**
 * Load the release configuration.
 *
 * Without an explicit path, `tagship.yml` in `cwd` is used when present and
 * the built-in defaults otherwise. An explicit path must exist.
 *
 * @param cwd - Directory relative paths are resolved against.
 * @param configPath - Optional explicit config file path.
 * @returns Resolved configuration.
 * @throws {ConfigError} When the file is missing (explicit path only), is not
 *   valid YAML, or does not match the config schema.
 */
export async function loadReleaseConfig(
  cwd: string,
  configPath?: string,
): Promise<ReleaseConfig> {
  let filePath = resolve(cwd, configPath ?? CONFIG_FILE_NAME)

  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    if (!configPath && isNotFound(error)) {
      return normalizeReleaseConfig({})
    }
    throw new ConfigError(`Cannot read config file ${filePath}`, {
      cause: error,
    })
  }

  let parsed: unknown
  try {
    parsed = parse(content)
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}`, { cause: error })
  }

  /** An empty file parses to null and means "all defaults". */
  if (parsed === null || parsed === undefined) {
    return normalizeReleaseConfig({})
  }

  if (!isReleaseConfigFile(parsed)) {
    throw new ConfigError(`Invalid release config in ${filePath}`)
  }

  return normalizeReleaseConfig(parsed)
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  )
}
