import { execFileSync } from 'node:child_process'

/**
 * Resolve GitHub token from environment or the gh CLI.
 *
 * @returns Token string or undefined when not found.
 */
export function resolveGitHubTokenSync(): undefined | string {
  for (let name of ['GITHUB_TOKEN', 'GH_TOKEN']) {
    let value = process.env[name]?.trim()
    if (value) {
      return value
    }
  }

  try {
    let output = execFileSync('gh', ['auth', 'token'], {
      stdio: ['ignore', 'pipe', 'ignore'],
      encoding: 'utf8',
      timeout: 500,
    })
    let token = output.trim()
    if (token) {
      return token
    }
  } catch {
    /** The gh CLI is optional. */
  }

  return undefined
}
