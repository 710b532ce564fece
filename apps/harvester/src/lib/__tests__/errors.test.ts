import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { classifyHarvestError, ConfigError, ERROR_CODES, FetchError, HarvestError } from '../errors.js'

const URL_0 = 'https://reactions.example.test/start/0'

describe('FetchError', () => {
  it('maps the fetch status to an error code', () => {
    expect(new FetchError(URL_0, 'error', 'HTTP 500', 500).code).toBe(ERROR_CODES.FETCH_FAILED)
    expect(new FetchError(URL_0, 'timeout', 'timed out').code).toBe(ERROR_CODES.FETCH_TIMEOUT)
    expect(new FetchError(URL_0, 'too_large', 'too big').code).toBe(ERROR_CODES.FETCH_TOO_LARGE)
  })

  it('is a HarvestError', () => {
    const error = new FetchError(URL_0, 'error', 'HTTP 404', 404)
    expect(error).toBeInstanceOf(HarvestError)
    expect(error.name).toBe('FetchError')
  })
})

describe('classifyHarvestError', () => {
  it('treats server errors, throttling and timeouts as retryable', () => {
    expect(classifyHarvestError(new FetchError(URL_0, 'error', 'HTTP 503', 503)).retryable).toBe(true)
    expect(classifyHarvestError(new FetchError(URL_0, 'error', 'HTTP 429', 429)).retryable).toBe(true)
    expect(classifyHarvestError(new FetchError(URL_0, 'timeout', 'timed out')).retryable).toBe(true)
    expect(classifyHarvestError(new FetchError(URL_0, 'error', 'fetch failed')).retryable).toBe(true)
  })

  it('treats client errors as permanent', () => {
    expect(classifyHarvestError(new FetchError(URL_0, 'error', 'HTTP 404', 404))).toEqual({
      code: ERROR_CODES.FETCH_FAILED,
      message: 'HTTP 404',
      retryable: false,
    })
  })

  it('classifies zod failures as configuration errors', () => {
    const result = z.object({ maxPages: z.number() }).safeParse({ maxPages: 'x' })
    expect(result.success).toBe(false)
    if (result.success) return

    expect(classifyHarvestError(result.error)).toEqual({
      code: ERROR_CODES.INVALID_CONFIG,
      message: 'Invalid configuration: maxPages: Expected number, received string',
      retryable: false,
    })
  })

  it('keeps the code of other harvest errors', () => {
    expect(classifyHarvestError(new ConfigError('bad'))).toEqual({
      code: ERROR_CODES.INVALID_CONFIG,
      message: 'bad',
      retryable: false,
    })
  })

  it('falls back to an unexpected error', () => {
    expect(classifyHarvestError('boom')).toEqual({
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: 'boom',
      retryable: false,
    })
  })
})
