import type { ReleaseAsset } from '../../types/release-asset'

import { ASSET_CONTENT_TYPE } from '../constants'

/**
 * Describe the asset published for a platform's binary.
 *
 * @param binaryName - Name of the built binary.
 * @param platform - Platform name.
 * @param binaryPath - Path to the finished binary.
 * @returns Asset named `<binaryName>-<platform>`.
 */
export function createReleaseAsset(
  binaryName: string,
  platform: string,
  binaryPath: string,
): ReleaseAsset {
  return {
    contentType: ASSET_CONTENT_TYPE,
    name: `${binaryName}-${platform}`,
    binaryPath,
    platform,
  }
}
