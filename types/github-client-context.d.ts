import type { RepositorySlug } from './repository-slug'

/**
 * Internal client context shared by all API functions.
 *
 * Stores auth, target repository, base URL and the commit new tags point at for
 * a single run.
 */
export interface GitHubClientContext {
  /** Commit a missing release tag is created on; the default branch if unset. */
  commitish: undefined | string

  /** Repository releases are created in. */
  repository: RepositorySlug

  /** GitHub token, if available. */
  token: undefined | string

  /** GitHub REST API base URL. */
  baseUrl: string
}
