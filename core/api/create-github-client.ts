import type { GitHubClientContext } from '../../types/github-client-context'
import type { RepositorySlug } from '../../types/repository-slug'
import type { ReleaseClient } from '../../types/release-client'

import { resolveGitHubTokenSync } from './resolve-github-token-sync'
import { GITHUB_API_URL } from '../constants'
import { createRelease } from './create-release'
import { uploadAsset } from './upload-asset'

/** Options for creating a GitHub release client. */
interface CreateGitHubClientOptions {
  /** Commit new release tags point at; defaults to `GITHUB_SHA`. */
  commitish?: string

  /** Repository releases are created in. */
  repository: RepositorySlug

  /** API base URL; defaults to `GITHUB_API_URL` or the public API. */
  baseUrl?: string

  /** Token override; resolved from the environment when omitted. */
  token?: string
}

/**
 * Create a functional GitHub client bound to one repository.
 *
 * @param options - Repository, token, base URL and target commit.
 * @returns Client with bound methods.
 */
export function createGitHubClient(
  options: CreateGitHubClientOptions,
): ReleaseClient {
  let token = options.token ?? resolveGitHubTokenSync()
  let baseUrl = (
    options.baseUrl ||
    process.env['GITHUB_API_URL'] ||
    GITHUB_API_URL
  ).replace(/\/+$/u, '')

  let context: GitHubClientContext = {
    commitish: options.commitish || process.env['GITHUB_SHA'] || undefined,
    repository: options.repository,
    baseUrl,
    token,
  }

  return {
    uploadAsset: (handle, asset) => uploadAsset(context, handle, asset),
    createRelease: version => createRelease(context, version),
  }
}
