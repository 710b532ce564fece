/**
 * HTTP Fetcher Implementation
 *
 * Uses native fetch for page requests.
 * Supports timeout, size limits, bounded retries with backoff, and a
 * browser-like header set.
 */

import type { Fetcher, FetchOptions, FetchResult, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_RETRY_POLICY } from '../types.js'
import { sleep } from './pacing.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Defaults applied to every request; per-call options win */
  defaults?: FetchOptions
}

type ResolvedFetchOptions = {
  timeoutMs: number
  maxSizeBytes: number
  headers: Record<string, string>
  signal?: AbortSignal
}

/**
 * HTTP-based fetcher using native fetch.
 */
export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly defaults: FetchOptions

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.defaults = options.defaults ?? {}
  }

  /**
   * Fetch a URL and return the HTML content.
   * Never throws for network or HTTP failures; they come back as a non-ok status.
   */
  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const startTime = Date.now()
    const opts = this.resolveOptions(options)

    let lastError: Error | null = null
    let attempt = 0

    while (attempt < this.retryPolicy.maxAttempts) {
      if (opts.signal?.aborted) {
        return this.abortedResult(startTime, attempt)
      }
      attempt++
      try {
        const result = await this.fetchOnce(url, opts, startTime, attempt)

        if (
          this.isRetryable(result) &&
          attempt < this.retryPolicy.maxAttempts &&
          !opts.signal?.aborted
        ) {
          await sleep(this.backoffDelay(attempt), opts.signal)
          continue
        }

        return result
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error))

        if (opts.signal?.aborted) {
          return this.abortedResult(startTime, attempt)
        }

        if (attempt < this.retryPolicy.maxAttempts) {
          await sleep(this.backoffDelay(attempt), opts.signal)
          continue
        }
      }
    }

    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError?.message ?? 'Unknown error after retries',
      attempts: attempt,
    }
  }

  private abortedResult(startTime: number, attempts: number): FetchResult {
    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: 'Request aborted',
      attempts,
    }
  }

  private resolveOptions(options?: FetchOptions): ResolvedFetchOptions {
    return {
      timeoutMs: options?.timeoutMs ?? this.defaults.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs,
      maxSizeBytes:
        options?.maxSizeBytes ?? this.defaults.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes,
      headers: {
        ...DEFAULT_FETCH_HEADERS,
        ...(this.defaults.headers ?? {}),
        ...(options?.headers ?? {}),
      },
      signal: options?.signal ?? this.defaults.signal,
    }
  }

  private isRetryable(result: FetchResult): boolean {
    if (result.status === 'timeout') return true
    return (
      result.status === 'error' &&
      result.statusCode !== undefined &&
      this.retryPolicy.retryableStatusCodes.includes(result.statusCode)
    )
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(
    url: string,
    opts: ResolvedFetchOptions,
    startTime: number,
    attempt: number
  ): Promise<FetchResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), opts.timeoutMs)
    const onOuterAbort = () => controller.abort()
    if (opts.signal?.aborted) {
      controller.abort()
    } else {
      opts.signal?.addEventListener('abort', onOuterAbort, { once: true })
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: opts.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
          attempts: attempt,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > opts.maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
          attempts: attempt,
        }
      }

      const html = await this.readBodyWithLimit(response, opts.maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
          attempts: attempt,
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        html,
        durationMs: Date.now() - startTime,
        attempts: attempt,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError' && !opts.signal?.aborted) {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${opts.timeoutMs}ms`,
          attempts: attempt,
        }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
      opts.signal?.removeEventListener('abort', onOuterAbort)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      for (;;) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}
