import { describe, it, expect, vi } from 'vitest'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import type { RetryPolicy } from '../types.js'

const URL_0 = 'https://reactions.example.test/data/reaction/doi/10.1000/test-doi/start/0'

const fastRetries = (maxAttempts: number): RetryPolicy => ({
  maxAttempts,
  initialDelayMs: 1,
  maxDelayMs: 1,
  backoffMultiplier: 1,
  retryableStatusCodes: [500, 503],
})

/** fetch stand-in that never settles until the request signal aborts */
const hangingFetch = vi.fn((_url: string | URL | Request, init?: RequestInit) => {
  return new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => {
      const abortError = new Error('The operation was aborted.')
      abortError.name = 'AbortError'
      reject(abortError)
    })
  })
})

describe('HttpFetcher', () => {
  it('returns the page body on success', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('<html>ok</html>', { status: 200 }))
    vi.stubGlobal('fetch', fetchSpy)

    const result = await new HttpFetcher().fetch(URL_0)

    expect(result).toMatchObject({ status: 'ok', statusCode: 200, html: '<html>ok</html>', attempts: 1 })
  })

  it('sends browser-like headers merged with custom ones', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('', { status: 200 }))
    vi.stubGlobal('fetch', fetchSpy)

    await new HttpFetcher({ defaults: { headers: { 'X-Run': 'test' } } }).fetch(URL_0)

    const init: RequestInit = fetchSpy.mock.calls[0][1]
    expect(init.headers).toMatchObject({
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
      'X-Run': 'test',
    })
  })

  it('retries on retryable status codes', async () => {
    let callCount = 0
    const fetchSpy = vi.fn().mockImplementation(() => {
      callCount += 1
      if (callCount === 1) {
        return Promise.resolve(new Response('fail', { status: 500, statusText: 'Server Error' }))
      }
      return Promise.resolve(new Response('<html>ok</html>', { status: 200 }))
    })
    vi.stubGlobal('fetch', fetchSpy)

    const result = await new HttpFetcher({ retryPolicy: fastRetries(2) }).fetch(URL_0)

    expect(result.status).toBe('ok')
    expect(result.attempts).toBe(2)
    expect(fetchSpy).toHaveBeenCalledTimes(2)
  })

  it('gives up after the last attempt', async () => {
    const fetchSpy = vi
      .fn()
      .mockImplementation(() => Promise.resolve(new Response('busy', { status: 503, statusText: 'Service Unavailable' })))
    vi.stubGlobal('fetch', fetchSpy)

    const result = await new HttpFetcher({ retryPolicy: fastRetries(3) }).fetch(URL_0)

    expect(result).toMatchObject({
      status: 'error',
      statusCode: 503,
      error: 'HTTP 503: Service Unavailable',
      attempts: 3,
    })
    expect(fetchSpy).toHaveBeenCalledTimes(3)
  })

  it('does not retry a non-retryable status', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('missing', { status: 404, statusText: 'Not Found' }))
    vi.stubGlobal('fetch', fetchSpy)

    const result = await new HttpFetcher({ retryPolicy: fastRetries(3) }).fetch(URL_0)

    expect(result).toMatchObject({ status: 'error', statusCode: 404, attempts: 1 })
    expect(fetchSpy).toHaveBeenCalledTimes(1)
  })

  it('retries thrown network errors and reports the last one', async () => {
    const fetchSpy = vi.fn().mockRejectedValue(new TypeError('fetch failed'))
    vi.stubGlobal('fetch', fetchSpy)

    const result = await new HttpFetcher({ retryPolicy: fastRetries(2) }).fetch(URL_0)

    expect(result).toMatchObject({ status: 'error', error: 'fetch failed', attempts: 2 })
    expect(fetchSpy).toHaveBeenCalledTimes(2)
  })

  it('reports a timeout when the request outlives timeoutMs', async () => {
    hangingFetch.mockClear()
    vi.stubGlobal('fetch', hangingFetch)

    const result = await new HttpFetcher({ retryPolicy: fastRetries(1) }).fetch(URL_0, { timeoutMs: 5 })

    expect(result).toMatchObject({ status: 'timeout', error: 'Request timed out after 5ms', attempts: 1 })
  })

  it('rejects bodies over the size limit', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('x'.repeat(64), { status: 200 })))

    const result = await new HttpFetcher().fetch(URL_0, { maxSizeBytes: 16 })

    expect(result.status).toBe('too_large')
  })

  it('stops retrying once the caller aborts', async () => {
    const controller = new AbortController()
    const fetchSpy = vi.fn().mockImplementation(() => {
      controller.abort()
      return Promise.resolve(new Response('busy', { status: 503, statusText: 'Service Unavailable' }))
    })
    vi.stubGlobal('fetch', fetchSpy)

    const result = await new HttpFetcher({ retryPolicy: fastRetries(3) }).fetch(URL_0, {
      signal: controller.signal,
    })

    expect(result.status).toBe('error')
    expect(fetchSpy).toHaveBeenCalledTimes(1)
  })

  it('does not start another attempt after an abort during a request', async () => {
    hangingFetch.mockClear()
    vi.stubGlobal('fetch', hangingFetch)
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 5)

    const result = await new HttpFetcher({ retryPolicy: fastRetries(3) }).fetch(URL_0, {
      signal: controller.signal,
    })

    expect(result).toMatchObject({ status: 'error', error: 'Request aborted', attempts: 1 })
    expect(hangingFetch).toHaveBeenCalledTimes(1)
  })

  it('makes no request when the signal has already aborted', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('<html>ok</html>', { status: 200 }))
    vi.stubGlobal('fetch', fetchSpy)
    const controller = new AbortController()
    controller.abort()

    const result = await new HttpFetcher().fetch(URL_0, { signal: controller.signal })

    expect(result).toMatchObject({ status: 'error', error: 'Request aborted', attempts: 0 })
    expect(fetchSpy).not.toHaveBeenCalled()
  })
})
