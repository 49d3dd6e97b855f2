import type { GitHubClientContext } from '../../types/github-client-context'

import { GitHubApiError } from '../errors/github-api-error'
import { readErrorDetail } from './read-error-detail'

/** Request options accepted by `makeRequest`. */
interface RequestOptions {
  /** Extra headers; override the defaults. */
  headers?: Record<string, string>

  /** Raw request body. */
  body?: Uint8Array | string

  /** HTTP method, GET by default. */
  method?: string
}

/**
 * Perform an authenticated HTTP request against the GitHub API.
 *
 * @param context - Client context with token and base URL.
 * @param target - API path beginning with '/', or an absolute URL (used for
 *   the uploads host).
 * @param options - Method, headers and body.
 * @returns Parsed response body; null when empty.
 * @throws {GitHubApiError} On any non-2xx response.
 */
export async function makeRequest(
  context: GitHubClientContext,
  target: string,
  options: RequestOptions = {},
): Promise<{ data: unknown }> {
  let headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
    'User-Agent': 'tagship',
    ...options.headers,
  }

  if (context.token) {
    headers['Authorization'] = `Bearer ${context.token}`
  }

  let url = /^https?:\/\//u.test(target) ? target : `${context.baseUrl}${target}`
  let response = await fetch(url, {
    method: options.method ?? 'GET',
    body: options.body,
    headers,
  })

  if (!response.ok) {
    let text = await response.text()
    let detail = readErrorDetail(text, response.statusText)

    if (
      (response.status === 403 || response.status === 429) &&
      text.includes('rate limit')
    ) {
      detail = 'API rate limit exceeded'
    }

    throw new GitHubApiError(response.status, response.statusText, detail)
  }

  let text = await response.text()
  let data: unknown = text === '' ? null : JSON.parse(text)
  return { data }
}
