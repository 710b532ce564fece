/**
 * Request pacing between pages.
 *
 * The run is single-threaded, so a plain randomized pause between page
 * fetches is all the rate limiting it needs.
 */

export interface DelayRange {
  minMs: number
  maxMs: number
}

export type RandomSource = () => number

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Pick a delay uniformly from [minMs, maxMs].
 */
export function randomDelayMs(range: DelayRange, random: RandomSource = Math.random): number {
  const span = Math.max(0, range.maxMs - range.minMs)
  return Math.round(range.minMs + random() * span)
}

/**
 * Sleep helper. Resolves early (without throwing) when the signal aborts.
 */
export const sleep: SleepFn = (ms, signal) => {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve()
  }

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
