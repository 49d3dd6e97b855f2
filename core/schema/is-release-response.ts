import type { components } from '@octokit/openapi-types'

/** Fields of the GitHub release payload the pipeline relies on. */
export type ReleaseResponse = Pick<
  components['schemas']['release'],
  'upload_url' | 'tag_name' | 'html_url' | 'id'
>

/**
 * Type guard for the body returned by "create a release".
 *
 * @param value - Parsed response body.
 * @returns True when the payload has the fields needed to upload assets.
 */
export function isReleaseResponse(value: unknown): value is ReleaseResponse {
  return (
    value !== null &&
    typeof value === 'object' &&
    'upload_url' in value &&
    typeof value.upload_url === 'string' &&
    'tag_name' in value &&
    typeof value.tag_name === 'string' &&
    'html_url' in value &&
    typeof value.html_url === 'string' &&
    'id' in value &&
    typeof value.id === 'number'
  )
}
