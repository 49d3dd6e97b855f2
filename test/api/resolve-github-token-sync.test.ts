import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest'

describe('resolveGitHubTokenSync', () => {
  beforeEach(() => {
    vi.resetModules()
    vi.doUnmock('node:child_process')
    vi.stubEnv('GITHUB_TOKEN', '')
    vi.stubEnv('GH_TOKEN', '')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('returns GITHUB_TOKEN from env', async () => {
    vi.stubEnv('GITHUB_TOKEN', ' env-token ')
    let { resolveGitHubTokenSync } =
      await import('../../core/api/resolve-github-token-sync')
    expect(resolveGitHubTokenSync()).toBe('env-token')
  })

  it('falls back to GH_TOKEN from env', async () => {
    vi.stubEnv('GH_TOKEN', 'gh-token')
    let { resolveGitHubTokenSync } =
      await import('../../core/api/resolve-github-token-sync')
    expect(resolveGitHubTokenSync()).toBe('gh-token')
  })

  it('reads token from gh CLI', async () => {
    vi.doMock('node:child_process', () => ({
      execFileSync: vi.fn(() => 'cli-token\n'),
    }))
    let { resolveGitHubTokenSync } =
      await import('../../core/api/resolve-github-token-sync')
    expect(resolveGitHubTokenSync()).toBe('cli-token')
  })

  it('returns undefined when gh CLI is unavailable', async () => {
    vi.doMock('node:child_process', () => ({
      execFileSync: vi.fn(() => {
        throw new Error('no cli')
      }),
    }))
    let { resolveGitHubTokenSync } =
      await import('../../core/api/resolve-github-token-sync')
    expect(resolveGitHubTokenSync()).toBeUndefined()
  })
})
