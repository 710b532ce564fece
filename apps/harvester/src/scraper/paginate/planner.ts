/**
 * Pagination Planner
 *
 * Decides which URL to visit after the current page.
 *
 * This is a heuristic over markup we do not control and is the most fragile
 * part of the scraper. A link labelled "next" that points somewhere
 * unexpected, or an offset the source does not honour, produces a wrong URL.
 * The orchestrator's visited-URL guard is what keeps a bad answer from
 * looping forever.
 */

import type { CheerioAPI } from 'cheerio'
import { SELECTORS } from '../extract/selectors.js'

/**
 * Link labels that mean "next page". Matched as lower-cased substrings of the
 * link's trimmed text, so the bare `>` also catches labels like "Next >".
 */
export const NEXT_PAGE_INDICATORS: readonly string[] = ['next', '»', '>', '→', 'forward']

export const DEFAULT_PAGE_SIZE = 10

const START_OFFSET_PATTERN = /\/start\/(\d+)/

export interface PlannerOptions {
  /** Source origin used to resolve relative links and build offset URLs */
  baseUrl: string
  doi: string
  /** Records per page assumed by the offset fallback */
  pageSize?: number
}

/**
 * Listing URL for a DOI at a record offset.
 */
export function buildPageUrl(baseUrl: string, doi: string, start: number): string {
  return `${trimTrailingSlash(baseUrl)}/data/reaction/doi/${doi}/start/${start}`
}

/**
 * Resolve a link target against the source base URL. Absolute http(s)
 * targets are kept as they are.
 */
export function resolveHref(href: string, baseUrl: string): string {
  if (href.startsWith('http')) {
    return href
  }
  const base = trimTrailingSlash(baseUrl)
  return href.startsWith('/') ? `${base}${href}` : `${base}/${href}`
}

export function isNextPageLabel(text: string): boolean {
  const label = text.trim().toLowerCase()
  return NEXT_PAGE_INDICATORS.some(indicator => label.includes(indicator))
}

/**
 * First link whose label reads as "next page", resolved to an absolute URL.
 */
export function findNextLink($: CheerioAPI, baseUrl: string): string | null {
  const link = $(SELECTORS.links)
    .toArray()
    .find(element => Boolean($(element).attr('href')) && isNextPageLabel($(element).text()))
  const href = link ? $(link).attr('href') : undefined
  return href ? resolveHref(href, baseUrl) : null
}

/**
 * Next URL from the `/start/<n>` offset in the current URL, or null when the
 * URL has no offset segment.
 */
export function nextOffsetUrl(currentUrl: string, options: PlannerOptions): string | null {
  const match = START_OFFSET_PATTERN.exec(currentUrl)
  if (!match) {
    return null
  }
  const current = Number.parseInt(match[1], 10)
  return buildPageUrl(options.baseUrl, options.doi, current + (options.pageSize ?? DEFAULT_PAGE_SIZE))
}

/**
 * Next page to visit, or null when there are no further pages.
 * A "next" link wins over the offset fallback.
 */
export function planNextUrl($: CheerioAPI, currentUrl: string, options: PlannerOptions): string | null {
  return findNextLink($, options.baseUrl) ?? nextOffsetUrl(currentUrl, options)
}

function trimTrailingSlash(value: string): string {
  return value.endsWith('/') ? value.slice(0, -1) : value
}
