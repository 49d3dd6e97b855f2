/** Non-success response from the GitHub REST API. */
export class GitHubApiError extends Error {
  public readonly status: number
  public readonly detail: string

  /**
   * @param status - HTTP status code.
   * @param statusText - HTTP status text.
   * @param detail - Message from the response body, or the status text.
   */
  public constructor(status: number, statusText: string, detail: string) {
    super(`GitHub API error: ${status} ${statusText}`)
    this.name = 'GitHubApiError'
    this.status = status
    this.detail = detail
  }
}
