import { describe, expect, it } from 'vitest'

import { isReleaseConfigFile } from '../../core/schema/is-release-config-file'

describe('isReleaseConfigFile', () => {
  it('accepts an empty object', () => {
    expect(isReleaseConfigFile({})).toBeTruthy()
  })

  it('accepts a complete config', () => {
    expect(
      isReleaseConfigFile({
        toolchain: {
          args: ['build', '--release'],
          env: { RUST_BACKTRACE: 'full' },
          outputRoot: 'target',
          native: 'cargo',
          cross: 'cross',
        },
        platforms: [{ target: 'x86_64-apple-darwin', name: 'macos', cross: true }],
        repository: 'octo/tool',
        tagPrefix: 'refs/tags/v',
        binary: 'acre',
      }),
    ).toBeTruthy()
  })

  it('rejects non-objects', () => {
    expect(isReleaseConfigFile(null)).toBeFalsy()
    expect(isReleaseConfigFile([])).toBeFalsy()
    expect(isReleaseConfigFile('binary: acre')).toBeFalsy()
  })

  it('rejects mistyped top-level keys', () => {
    expect(isReleaseConfigFile({ binary: 1 })).toBeFalsy()
    expect(isReleaseConfigFile({ tagPrefix: null })).toBeFalsy()
    expect(isReleaseConfigFile({ platforms: 'linux' })).toBeFalsy()
    expect(isReleaseConfigFile({ platforms: [{ os: 'linux' }] })).toBeFalsy()
  })

  it('rejects mistyped toolchain settings', () => {
    expect(isReleaseConfigFile({ toolchain: 'cargo' })).toBeFalsy()
    expect(isReleaseConfigFile({ toolchain: { native: true } })).toBeFalsy()
    expect(isReleaseConfigFile({ toolchain: { args: 'build' } })).toBeFalsy()
    expect(isReleaseConfigFile({ toolchain: { args: ['build', 1] } })).toBeFalsy()
    expect(isReleaseConfigFile({ toolchain: { env: ['A=1'] } })).toBeFalsy()
    expect(isReleaseConfigFile({ toolchain: { env: { A: 1 } } })).toBeFalsy()
  })
})
