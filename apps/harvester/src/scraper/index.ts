/**
 * Reaction Scraper
 *
 * Extraction, splitting, dedup and pagination for per-DOI reaction listings.
 */

// Core types
export * from './types.js'

// Fetch layer
export { HttpFetcher } from './fetch/http-fetcher.js'
export type { HttpFetcherOptions } from './fetch/http-fetcher.js'
export { randomDelayMs, sleep } from './fetch/pacing.js'
export type { DelayRange, RandomSource, SleepFn } from './fetch/pacing.js'

// Extraction and parsing
export { extractCandidates, DEFAULT_STRATEGIES } from './extract/index.js'
export { splitReaction, splitComponents, joinReaction } from './parse/split-reaction.js'

// Pagination
export { planNextUrl, buildPageUrl, DEFAULT_PAGE_SIZE } from './paginate/planner.js'

// Processing
export { processPage } from './process/page.js'
export type { ProcessedPage, ProcessPageOptions } from './process/page.js'
export { ReactionStore } from './process/reaction-store.js'

// Orchestration
export { runScrape } from './orchestrator.js'
export type { ScrapeOptions, ScrapeDependencies } from './orchestrator.js'
