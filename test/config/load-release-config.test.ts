import { beforeEach, describe, expect, it, vi } from 'vitest'
import { readFile } from 'node:fs/promises'

import { loadReleaseConfig } from '../../core/config/load-release-config'
import { DEFAULT_PLATFORMS } from '../../core/config/default-platforms'
import { ConfigError } from '../../core/errors/config-error'

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}))

function notFound(): Error {
  return Object.assign(new Error('ENOENT: no such file or directory'), {
    code: 'ENOENT',
  })
}

describe('loadReleaseConfig', () => {
  beforeEach(() => {
    vi.mocked(readFile).mockReset()
  })

  it('uses defaults when tagship.yml is absent', async () => {
    vi.mocked(readFile).mockRejectedValue(notFound())

    let config = await loadReleaseConfig('/repo')

    expect(readFile).toHaveBeenCalledWith('/repo/tagship.yml', 'utf8')
    expect(config).toEqual({
      toolchain: {
        args: ['build', '--release'],
        env: { RUST_BACKTRACE: '1' },
        outputRoot: './target',
        native: 'cargo',
        cross: 'cross',
      },
      platforms: [...DEFAULT_PLATFORMS],
      tagPrefix: 'refs/tags/v',
      repository: null,
      binary: 'acre',
    })
  })

  it('fails when an explicit config file is missing', async () => {
    vi.mocked(readFile).mockRejectedValue(notFound())

    let promise = loadReleaseConfig('/repo', 'release/custom.yml')

    await expect(promise).rejects.toBeInstanceOf(ConfigError)
    await expect(promise).rejects.toHaveProperty(
      'message',
      'Cannot read config file /repo/release/custom.yml',
    )
  })

  it('fails when the default file cannot be read for other reasons', async () => {
    vi.mocked(readFile).mockRejectedValue(new Error('EACCES'))

    await expect(loadReleaseConfig('/repo')).rejects.toBeInstanceOf(
      ConfigError,
    )
  })

  it('merges the file over the defaults', async () => {
    vi.mocked(readFile).mockResolvedValue(
      [
        'binary: tool',
        'repository: octo/tool',
        'tagPrefix: refs/tags/',
        'toolchain:',
        '  outputRoot: out',
        'platforms:',
        '  - name: linux',
        '    target: x86_64-unknown-linux-musl',
        '    cross: true',
        '  - name: macos',
        '    os: macos-14',
        '    strip: false',
        '',
      ].join('\n'),
    )

    let config = await loadReleaseConfig('/repo')

    expect(config).toEqual({
      platforms: [
        {
          target: 'x86_64-unknown-linux-musl',
          name: 'linux',
          cross: true,
          strip: true,
          os: 'linux',
        },
        { name: 'macos', os: 'macos-14', cross: false, strip: false },
      ],
      toolchain: {
        args: ['build', '--release'],
        env: { RUST_BACKTRACE: '1' },
        outputRoot: 'out',
        native: 'cargo',
        cross: 'cross',
      },
      repository: 'octo/tool',
      tagPrefix: 'refs/tags/',
      binary: 'tool',
    })
  })

  it('treats an empty file as all defaults', async () => {
    vi.mocked(readFile).mockResolvedValue('')

    let config = await loadReleaseConfig('/repo')

    expect(config.binary).toBe('acre')
    expect(config.platforms.map(platform => platform.name)).toEqual([
      'linux',
      'macos',
    ])
  })

  it('rejects invalid YAML', async () => {
    vi.mocked(readFile).mockResolvedValue('platforms: [\n')

    await expect(loadReleaseConfig('/repo')).rejects.toHaveProperty(
      'message',
      'Invalid YAML in /repo/tagship.yml',
    )
  })

  it('rejects a config that does not match the schema', async () => {
    vi.mocked(readFile).mockResolvedValue('platforms: linux\n')

    await expect(loadReleaseConfig('/repo')).rejects.toHaveProperty(
      'message',
      'Invalid release config in /repo/tagship.yml',
    )
  })

  it('rejects duplicate platform names', async () => {
    vi.mocked(readFile).mockResolvedValue(
      'platforms:\n  - name: linux\n  - name: linux\n',
    )

    await expect(loadReleaseConfig('/repo')).rejects.toHaveProperty(
      'message',
      'Duplicate platform name: linux',
    )
  })
})
