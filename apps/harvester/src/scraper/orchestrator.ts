/**
 * Scrape Orchestrator
 *
 * Drives one run for one DOI:
 * 1. Fetch the current page
 * 2. Extract candidates and split them into records
 * 3. Insert records into the run's store (dedup)
 * 4. Plan the next URL
 * 5. Pause a random delay, then repeat
 *
 * Stops on abort, page limit, a revisited URL, a fetch failure, or when the
 * planner has nothing left. Records collected before a stop are always
 * returned.
 */

import { silentLogger, type ILogger } from '@reaction-harvest/logger'
import { FetchError } from '../lib/errors.js'
import { randomDelayMs, sleep as defaultSleep, type DelayRange, type RandomSource, type SleepFn } from './fetch/pacing.js'
import { buildPageUrl, planNextUrl } from './paginate/planner.js'
import { processPage } from './process/page.js'
import { ReactionStore } from './process/reaction-store.js'
import type {
  Fetcher,
  PageReport,
  PaginationState,
  ProductPolicy,
  ScrapeRunResult,
  StopReason,
} from './types.js'

export interface ScrapeOptions {
  doi: string
  baseUrl: string
  maxPages: number
  delay: DelayRange
  pageSize?: number
  recordProvenance?: boolean
  /** Used only when no store is injected */
  productPolicy?: ProductPolicy
  timeoutMs?: number
}

export interface ScrapeDependencies {
  fetcher: Fetcher
  store?: ReactionStore
  logger?: ILogger
  sleep?: SleepFn
  random?: RandomSource
  now?: () => Date
  /** Checked at the top of every iteration and passed to fetch and pause */
  signal?: AbortSignal
}

export async function runScrape(options: ScrapeOptions, deps: ScrapeDependencies): Promise<ScrapeRunResult> {
  const log = (deps.logger ?? silentLogger).child({ doi: options.doi })
  const store = deps.store ?? new ReactionStore({ productPolicy: options.productPolicy })
  const pause = deps.sleep ?? defaultSleep
  const now = deps.now ?? (() => new Date())
  const { signal } = deps

  const startedAt = now().toISOString()
  const state: PaginationState = {
    currentUrl: buildPageUrl(options.baseUrl, options.doi, 0),
    visited: new Set(),
    pagesScraped: 0,
  }
  const pages: PageReport[] = []
  let stopReason: StopReason = 'no_next_page'
  let error: FetchError | undefined

  log.info('Scrape started', { maxPages: options.maxPages, startUrl: state.currentUrl })

  while (state.currentUrl) {
    if (signal?.aborted) {
      stopReason = 'aborted'
      break
    }
    if (state.pagesScraped >= options.maxPages) {
      stopReason = 'max_pages'
      break
    }

    const url = state.currentUrl
    if (state.visited.has(url)) {
      log.warn('Already visited URL, stopping to avoid a loop', { url })
      stopReason = 'cycle'
      break
    }
    state.visited.add(url)

    const pageNumber = state.pagesScraped + 1
    log.info('Scraping page', { page: pageNumber, url })

    const fetched = await deps.fetcher.fetch(url, { timeoutMs: options.timeoutMs, signal })
    if (fetched.status !== 'ok' || fetched.html === undefined) {
      if (signal?.aborted) {
        stopReason = 'aborted'
        break
      }
      error = new FetchError(
        url,
        fetched.status === 'ok' ? 'error' : fetched.status,
        fetched.error ?? `Fetch failed with status ${fetched.status}`,
        fetched.statusCode
      )
      log.error('Failed to fetch page, stopping', {
        page: pageNumber,
        url,
        status: fetched.status,
        statusCode: fetched.statusCode,
        attempts: fetched.attempts,
      }, error)
      stopReason = 'fetch_failed'
      break
    }

    const page = processPage(fetched.html, url, {
      scrapedAt: now().toISOString(),
      recordProvenance: options.recordProvenance,
    })

    let stored = 0
    for (const record of page.records) {
      if (store.insert(record)) {
        stored++
      }
    }

    const report: PageReport = {
      page: pageNumber,
      url,
      candidates: page.candidates.length,
      parsed: page.records.length,
      stored,
    }
    pages.push(report)
    log.info('Page processed', { ...report, discarded: page.discarded.length, total: store.size })
    if (stored === 0 && state.pagesScraped > 0) {
      log.info('No new reactions on page, checking next page', { page: pageNumber })
    }

    state.currentUrl = planNextUrl(page.$, url, {
      baseUrl: options.baseUrl,
      doi: options.doi,
      pageSize: options.pageSize,
    })
    state.pagesScraped++

    if (state.currentUrl && state.pagesScraped < options.maxPages) {
      const delayMs = randomDelayMs(options.delay, deps.random)
      log.debug('Pausing before next page', { delayMs, next: state.currentUrl })
      await pause(delayMs, signal)
    }
  }

  const summary = store.summary()
  log.info('Scrape complete', { stopReason, pagesScraped: state.pagesScraped, ...summary })

  return {
    doi: options.doi,
    source: options.baseUrl,
    records: store.exportAll(),
    summary,
    pages,
    pagesScraped: state.pagesScraped,
    stopReason,
    error,
    startedAt,
    finishedAt: now().toISOString(),
  }
}
