import type { ReleaseHandle } from './release-handle'
import type { ReleaseAsset } from './release-asset'
import type { AssetAck } from './asset-ack'

/**
 * Remote operations the pipeline needs from the hosting API.
 *
 * Implemented by `createGitHubClient`; tests substitute in-memory fakes.
 */
export interface ReleaseClient {
  /** Upload a binary to the release identified by `handle`. */
  uploadAsset(handle: ReleaseHandle, asset: ReleaseAsset): Promise<AssetAck>

  /** Create a release whose tag and name are both `version`. */
  createRelease(version: string): Promise<ReleaseHandle>
}
