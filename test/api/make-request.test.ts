import { beforeEach, describe, expect, it, vi } from 'vitest'

import { createClientContext } from '../helpers/create-client-context'
import { GitHubApiError } from '../../core/errors/github-api-error'
import { makeRequest } from '../../core/api/make-request'

describe('makeRequest', () => {
  beforeEach(() => vi.restoreAllMocks())

  it('sets Authorization header when token present', async () => {
    let spy = vi.spyOn(globalThis, 'fetch').mockImplementation((url, init) => {
      expect(url).toBe('https://api.github.com/path')
      expect(new Headers(init?.headers).get('authorization')).toBe(
        'Bearer test-token',
      )
      return Promise.resolve(new Response('{}', { status: 200 }))
    })

    await makeRequest(createClientContext('test-token'), '/path')
    expect(spy).toHaveBeenCalledOnce()
  })

  it('omits Authorization header without a token', async () => {
    vi.spyOn(globalThis, 'fetch').mockImplementation((_url, init) => {
      let headers = new Headers(init?.headers)
      expect(headers.has('authorization')).toBeFalsy()
      expect(headers.get('user-agent')).toBe('tagship')
      return Promise.resolve(new Response('{}', { status: 200 }))
    })

    await makeRequest(createClientContext(), '/path')
  })

  it('uses absolute URLs as is', async () => {
    let spy = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValue(new Response('{}', { status: 201 }))

    await makeRequest(
      createClientContext(),
      'https://uploads.github.com/repos/octo/tool/releases/1/assets?name=a',
      { method: 'POST', body: 'data' },
    )

    expect(spy).toHaveBeenCalledWith(
      'https://uploads.github.com/repos/octo/tool/releases/1/assets?name=a',
      expect.objectContaining({ method: 'POST', body: 'data' }),
    )
  })

  it('returns parsed JSON data', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('{"id":1}', { status: 200 }),
    )

    let { data } = await makeRequest(createClientContext(), '/x')
    expect(data).toEqual({ id: 1 })
  })

  it('returns null data for an empty body', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('', { status: 200 }),
    )

    let { data } = await makeRequest(createClientContext(), '/x')
    expect(data).toBeNull()
  })

  it('maps 403 with rate limit message to friendly detail', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('API rate limit exceeded', {
        statusText: 'Forbidden',
        status: 403,
      }),
    )

    let promise = makeRequest(createClientContext(), '/x')
    await expect(promise).rejects.toBeInstanceOf(GitHubApiError)
    await expect(promise).rejects.toMatchObject({
      message: 'GitHub API error: 403 Forbidden',
      detail: 'API rate limit exceeded',
      status: 403,
    })
  })

  it('reads validation errors from the body', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(
        JSON.stringify({
          errors: [{ resource: 'Release', code: 'already_exists' }],
          message: 'Validation Failed',
        }),
        { statusText: 'Unprocessable Entity', status: 422 },
      ),
    )

    await expect(makeRequest(createClientContext(), '/x')).rejects.toMatchObject(
      {
        message: 'GitHub API error: 422 Unprocessable Entity',
        detail: 'Validation Failed (already_exists)',
        status: 422,
      },
    )
  })

  it('parses a JSON body on success', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('{"id":7}', { status: 200 }),
    )

    let { data } = await makeRequest(createClientContext(), '/ok')
    expect(data).toEqual({ id: 7 })
  })
})
