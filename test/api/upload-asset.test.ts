import { beforeEach, describe, expect, it, vi } from 'vitest'
import { readFile } from 'node:fs/promises'

import type { ReleaseHandle } from '../../types/release-handle'
import type { ReleaseAsset } from '../../types/release-asset'

import { createClientContext } from '../helpers/create-client-context'
import { UploadFailedError } from '../../core/errors/upload-failed-error'
import { uploadAsset } from '../../core/api/upload-asset'

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}))

describe('uploadAsset', () => {
  let handle: ReleaseHandle = {
    uploadUrl: 'https://uploads.github.com/repos/octo/tool/releases/42/assets',
    url: 'https://github.com/octo/tool/releases/tag/1.2.3',
    tag: '1.2.3',
    id: 42,
  }

  let asset: ReleaseAsset = {
    binaryPath: '/work/target/release/acre',
    contentType: 'application/octet-stream',
    name: 'acre-linux',
    platform: 'linux',
  }

  beforeEach(() => {
    vi.restoreAllMocks()
    vi.mocked(readFile).mockReset()
  })

  it('uploads the binary under the asset name', async () => {
    vi.mocked(readFile).mockResolvedValue(Buffer.from('binary'))
    let spy = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          browser_download_url:
            'https://github.com/octo/tool/releases/download/1.2.3/acre-linux',
          name: 'acre-linux',
          id: 7,
        }),
        { status: 201 },
      ),
    )

    let ack = await uploadAsset(createClientContext('test-token'), handle, asset)

    expect(ack).toEqual({
      downloadUrl:
        'https://github.com/octo/tool/releases/download/1.2.3/acre-linux',
      name: 'acre-linux',
      id: 7,
    })
    expect(readFile).toHaveBeenCalledWith('/work/target/release/acre')

    let [url, init] = spy.mock.calls[0] ?? []
    expect(url).toBe(
      'https://uploads.github.com/repos/octo/tool/releases/42/assets?name=acre-linux',
    )
    let headers = new Headers(init?.headers)
    expect(headers.get('content-type')).toBe('application/octet-stream')
    expect(headers.get('content-length')).toBe('6')
    expect(init?.method).toBe('POST')
  })

  it('fails without a status when the binary cannot be read', async () => {
    vi.mocked(readFile).mockRejectedValue(new Error('EACCES: permission denied'))
    let spy = vi.spyOn(globalThis, 'fetch')

    let promise = uploadAsset(createClientContext('test-token'), handle, asset)

    await expect(promise).rejects.toBeInstanceOf(UploadFailedError)
    await expect(promise).rejects.toMatchObject({
      message: 'Upload failed for linux: EACCES: permission denied',
      platform: 'linux',
      status: null,
    })
    expect(spy).not.toHaveBeenCalled()
  })

  it('fails with the remote status on rejection', async () => {
    vi.mocked(readFile).mockResolvedValue(Buffer.from('binary'))
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('{"message":"Server Error"}', { status: 500 }),
    )

    await expect(
      uploadAsset(createClientContext('test-token'), handle, asset),
    ).rejects.toMatchObject({
      message: 'Upload failed for linux (500): Server Error',
      code: 'UPLOAD_FAILED',
      detail: 'Server Error',
      status: 500,
    })
  })

  it('fails on an unexpected response body', async () => {
    vi.mocked(readFile).mockResolvedValue(Buffer.from('binary'))
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('{"id":7}', { status: 201 }),
    )

    await expect(
      uploadAsset(createClientContext('test-token'), handle, asset),
    ).rejects.toHaveProperty('detail', 'Unexpected response from GitHub')
  })
})
