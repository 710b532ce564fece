/**
 * Reaction Scraper Core Types
 *
 * Candidates, split reactions, stored records, and the fetch layer contract.
 */

import type { CheerioAPI } from 'cheerio'

// ═══════════════════════════════════════════════════════════════════════════════
// Candidates
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Where a candidate reaction string was found on the page.
 */
export type ExtractionMethod = 'attribute' | 'script-pattern' | 'table-cell'

/**
 * An unvalidated string suspected of being a reaction SMILES.
 * Produced per page, never persisted.
 */
export interface RawCandidate {
  text: string
  method: ExtractionMethod
}

/**
 * One extraction heuristic. The set of strategies is closed; the
 * CandidateExtractor iterates over a fixed list of them.
 */
export interface CandidateStrategy {
  readonly method: ExtractionMethod
  extract($: CheerioAPI, rawText: string): string[]
}

// ═══════════════════════════════════════════════════════════════════════════════
// Reactions
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reaction string split into its three roles. Components keep source order.
 */
export interface SplitReaction {
  reactants: string[]
  reagents: string[]
  products: string[]
}

export interface ReactionRecord {
  /** Original unsplit text; the dedup key */
  readonly reactionSmiles: string
  readonly reactantSmiles: readonly string[]
  readonly reagentSmiles: readonly string[]
  readonly productSmiles: readonly string[]
  readonly sourceUrl: string
  /** Only set when the run records provenance */
  readonly extractionMethod?: ExtractionMethod
  /** ISO 8601 */
  readonly scrapedAt: string
}

/**
 * Store acceptance policy.
 * - reject-empty-products: records without products are not retained (default)
 * - accept-any: any split result with at least one non-empty role is retained
 */
export type ProductPolicy = 'reject-empty-products' | 'accept-any'

export interface ReactionSummary {
  totalReactions: number
  uniqueReactantComponents: number
  uniqueProductComponents: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fetcher interface. The orchestrator only ever sees HTML text.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** Aborts the in-flight request and any pending retry */
  signal?: AbortSignal
}

/**
 * Browser-like header set sent with every page request.
 */
export const DEFAULT_FETCH_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  'Upgrade-Insecure-Requests': '1',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 30000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const satisfies FetchOptions

export type FetchResultStatus = 'ok' | 'error' | 'timeout' | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  html?: string
  error?: string
  durationMs: number
  attempts: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  maxAttempts: number // Default: 3
  initialDelayMs: number // Default: 1000
  maxDelayMs: number // Default: 30000
  backoffMultiplier: number // Default: 2
  retryableStatusCodes: number[] // Default: [429, 500, 502, 503, 504]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run
// ═══════════════════════════════════════════════════════════════════════════════

export type StopReason = 'max_pages' | 'cycle' | 'fetch_failed' | 'no_next_page' | 'aborted'

export interface PaginationState {
  currentUrl: string | null
  visited: Set<string>
  pagesScraped: number
}

export interface PageReport {
  page: number
  url: string
  candidates: number
  parsed: number
  stored: number
}

export interface ScrapeRunResult {
  doi: string
  source: string
  records: ReactionRecord[]
  summary: ReactionSummary
  pages: PageReport[]
  pagesScraped: number
  stopReason: StopReason
  /** Set when stopReason is fetch_failed */
  error?: Error
  startedAt: string
  finishedAt: string
}
