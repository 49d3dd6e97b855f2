import semver from 'semver'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { ReleaseHandle } from '../../types/release-handle'

import { ReleaseCreationFailedError } from '../errors/release-creation-failed-error'
import { isReleaseResponse } from '../schema/is-release-response'
import { GitHubApiError } from '../errors/github-api-error'
import { makeRequest } from './make-request'

/**
 * Create a GitHub release for a version.
 *
 * The version is used as both the tag name and the release name. Versions with
 * a semver prerelease component (`1.0.0-rc.1`) are marked as prerelease. When
 * the tag does not exist yet, GitHub creates it on the context's commitish, or
 * on the default branch without one. A release that already exists is reported
 * as a failure; nothing is updated.
 *
 * @param context - Client context.
 * @param version - Version to publish.
 * @returns Handle pointing at the release's asset upload endpoint.
 * @throws {ReleaseCreationFailedError} On any request error or malformed
 *   response.
 */
export async function createRelease(
  context: GitHubClientContext,
  version: string,
): Promise<ReleaseHandle> {
  let { owner, repo } = context.repository
  let data: unknown

  try {
    let response = await makeRequest(
      context,
      `/repos/${owner}/${repo}/releases`,
      {
        body: JSON.stringify({
          ...(context.commitish
            ? { target_commitish: context.commitish }
            : {}),
          prerelease: semver.prerelease(version) !== null,
          tag_name: version,
          name: version,
        }),
        headers: { 'Content-Type': 'application/json' },
        method: 'POST',
      },
    )
    data = response.data
  } catch (error) {
    if (error instanceof GitHubApiError) {
      throw new ReleaseCreationFailedError(version, error.status, error.detail)
    }
    throw new ReleaseCreationFailedError(
      version,
      null,
      error instanceof Error ? error.message : String(error),
    )
  }

  if (!isReleaseResponse(data)) {
    throw new ReleaseCreationFailedError(
      version,
      null,
      'Unexpected response from GitHub',
    )
  }

  return {
    uploadUrl: data.upload_url.replace(/\{[^}]*\}$/u, ''),
    url: data.html_url,
    tag: data.tag_name,
    id: data.id,
  }
}
