/**
 * Identifies a created release and where its assets may be uploaded.
 *
 * Owned by the pipeline for one run and shared read-only between platform
 * branches.
 */
export interface ReleaseHandle {
  /** Asset upload endpoint, without the `{?name,label}` URI template. */
  uploadUrl: string

  /** HTML URL of the release page. */
  url: string

  /** Tag name the release was created for. */
  tag: string

  /** Numeric release ID. */
  id: number
}
