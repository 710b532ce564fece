/**
 * Single-page processing: extract candidates, split them, build records.
 */

import type { CheerioAPI } from 'cheerio'
import type { RawCandidate, ReactionRecord, SplitReaction } from '../types.js'
import { extractCandidates } from '../extract/index.js'
import { loadHtml } from '../kit/html.js'
import { splitReaction } from '../parse/split-reaction.js'

export interface ProcessPageOptions {
  /** Shared by every record from this page */
  scrapedAt: string
  /** Tag each record with the strategy that found it */
  recordProvenance?: boolean
}

export interface ProcessedPage {
  $: CheerioAPI
  candidates: RawCandidate[]
  records: ReactionRecord[]
  /** Candidates that did not split into a reaction */
  discarded: RawCandidate[]
}

export function toReactionRecord(
  candidate: RawCandidate,
  split: SplitReaction,
  sourceUrl: string,
  options: ProcessPageOptions
): ReactionRecord {
  return {
    reactionSmiles: candidate.text,
    reactantSmiles: split.reactants,
    reagentSmiles: split.reagents,
    productSmiles: split.products,
    sourceUrl,
    ...(options.recordProvenance ? { extractionMethod: candidate.method } : {}),
    scrapedAt: options.scrapedAt,
  }
}

export function processPage(html: string, url: string, options: ProcessPageOptions): ProcessedPage {
  const $ = loadHtml(html)
  const candidates = extractCandidates($, html)
  const records: ReactionRecord[] = []
  const discarded: RawCandidate[] = []

  for (const candidate of candidates) {
    const split = splitReaction(candidate.text)
    if (!split) {
      discarded.push(candidate)
      continue
    }
    records.push(toReactionRecord(candidate, split, url, options))
  }

  return { $, candidates, records, discarded }
}
