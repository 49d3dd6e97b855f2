/** Default config file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'tagship.yml'

/** Literal prefix that marks release tags. */
export const DEFAULT_TAG_PREFIX = 'refs/tags/v'

/** Binary built when the config does not name one. */
export const DEFAULT_BINARY_NAME = 'acre'

/** Content type sent with every uploaded asset. */
export const ASSET_CONTENT_TYPE = 'application/octet-stream'

/** Subdirectory of a plan's output directory holding release builds. */
export const RELEASE_DIRECTORY = 'release'

/** Executable used to strip debug symbols. */
export const STRIP_EXECUTABLE = 'strip'

/** Public GitHub REST API endpoint. */
export const GITHUB_API_URL = 'https://api.github.com'
