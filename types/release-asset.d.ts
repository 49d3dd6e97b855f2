/** A finished binary ready to be attached to a release. */
export interface ReleaseAsset {
  /** Remote-visible file name, `<binary>-<platform>`. */
  name: string

  /** Local path of the binary to upload. */
  binaryPath: string

  /** MIME type sent with the upload. */
  contentType: string

  /** Platform the asset was built for. */
  platform: string
}
