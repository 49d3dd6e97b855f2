import type { RepositorySlug } from '../../types/repository-slug'

import { ConfigError } from '../errors/config-error'

/**
 * Resolve the repository releases are published to.
 *
 * Precedence: explicit flag, config file, then `GITHUB_REPOSITORY` (set by
 * GitHub Actions).
 *
 * @param candidates - Slugs in precedence order; empty values are skipped.
 * @returns Owner and repository name.
 * @throws {ConfigError} When no slug is available or it is not `owner/repo`.
 */
export function resolveRepository(
  ...candidates: (undefined | string | null)[]
): RepositorySlug {
  let slug = [...candidates, process.env['GITHUB_REPOSITORY']]
    .map(value => value?.trim())
    .find(Boolean)

  if (!slug) {
    throw new ConfigError(
      'Repository is not set. Use --repo, the "repository" config key, or GITHUB_REPOSITORY',
    )
  }

  let match = slug.match(/^(?<owner>[\w.-]+)\/(?<repo>[\w.-]+)$/u)
  let owner = match?.groups?.['owner']
  let repo = match?.groups?.['repo']
  if (!owner || !repo) {
    throw new ConfigError(`Invalid repository "${slug}", expected owner/repo`)
  }

  return { owner, repo }
}
