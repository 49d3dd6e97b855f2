/** Acknowledgement returned by the upload endpoint. */
export interface AssetAck {
  /** Public download URL of the uploaded asset. */
  downloadUrl: string

  /** Asset name as stored by GitHub. */
  name: string

  /** Numeric asset ID. */
  id: number
}
