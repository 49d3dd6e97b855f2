import { readFile } from 'node:fs/promises'

import type { GitHubClientContext } from '../../types/github-client-context'
import type { ReleaseHandle } from '../../types/release-handle'
import type { ReleaseAsset } from '../../types/release-asset'
import type { AssetAck } from '../../types/asset-ack'

import { isReleaseAssetResponse } from '../schema/is-release-asset-response'
import { UploadFailedError } from '../errors/upload-failed-error'
import { GitHubApiError } from '../errors/github-api-error'
import { makeRequest } from './make-request'

/**
 * Upload a binary as an asset of a release. Not retried.
 *
 * @param context - Client context.
 * @param handle - Release to attach the asset to.
 * @param asset - Binary path, remote name and content type.
 * @returns Acknowledgement with the asset's download URL.
 * @throws {UploadFailedError} When the file cannot be read or GitHub rejects
 *   the upload.
 */
export async function uploadAsset(
  context: GitHubClientContext,
  handle: ReleaseHandle,
  asset: ReleaseAsset,
): Promise<AssetAck> {
  let content: Buffer
  try {
    content = await readFile(asset.binaryPath)
  } catch (error) {
    throw new UploadFailedError(
      asset.platform,
      null,
      error instanceof Error ? error.message : String(error),
    )
  }

  let query = new URLSearchParams({ name: asset.name })
  let data: unknown

  try {
    let response = await makeRequest(context, `${handle.uploadUrl}?${query}`, {
      headers: {
        'Content-Length': String(content.byteLength),
        'Content-Type': asset.contentType,
      },
      method: 'POST',
      body: content,
    })
    data = response.data
  } catch (error) {
    if (error instanceof GitHubApiError) {
      throw new UploadFailedError(asset.platform, error.status, error.detail)
    }
    throw new UploadFailedError(
      asset.platform,
      null,
      error instanceof Error ? error.message : String(error),
    )
  }

  if (!isReleaseAssetResponse(data)) {
    throw new UploadFailedError(
      asset.platform,
      null,
      'Unexpected response from GitHub',
    )
  }

  return {
    downloadUrl: data.browser_download_url,
    name: data.name,
    id: data.id,
  }
}
