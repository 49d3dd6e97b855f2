import type { components } from '@octokit/openapi-types'

/** Fields of the GitHub release-asset payload the pipeline relies on. */
export type ReleaseAssetResponse = Pick<
  components['schemas']['release-asset'],
  'browser_download_url' | 'name' | 'id'
>

/**
 * Type guard for the body returned by "upload a release asset".
 *
 * @param value - Parsed response body.
 * @returns True when the payload describes an uploaded asset.
 */
export function isReleaseAssetResponse(
  value: unknown,
): value is ReleaseAssetResponse {
  return (
    value !== null &&
    typeof value === 'object' &&
    'browser_download_url' in value &&
    typeof value.browser_download_url === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'id' in value &&
    typeof value.id === 'number'
  )
}
