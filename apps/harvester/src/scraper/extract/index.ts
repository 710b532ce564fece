/**
 * Candidate Extraction
 *
 * Runs every strategy against the page and unions the results. Strategies
 * are independent: one finding nothing never stops the others.
 */

import type { CheerioAPI } from 'cheerio'
import type { CandidateStrategy, RawCandidate } from '../types.js'
import { attributeStrategy } from './attribute.js'
import { scriptPatternStrategy } from './script-pattern.js'
import { tableCellStrategy } from './table-cell.js'

export const DEFAULT_STRATEGIES: readonly CandidateStrategy[] = [
  attributeStrategy,
  scriptPatternStrategy,
  tableCellStrategy,
]

/**
 * Candidates for one page, deduplicated by exact (case-sensitive) text.
 * When two strategies find the same text, the earlier strategy's method wins.
 */
export function extractCandidates(
  $: CheerioAPI,
  rawText: string,
  strategies: readonly CandidateStrategy[] = DEFAULT_STRATEGIES
): RawCandidate[] {
  const byText = new Map<string, RawCandidate>()

  for (const strategy of strategies) {
    for (const text of strategy.extract($, rawText)) {
      if (!byText.has(text)) {
        byText.set(text, { text, method: strategy.method })
      }
    }
  }

  return [...byText.values()]
}

export { attributeStrategy } from './attribute.js'
export { scriptPatternStrategy, matchScriptPatterns, SCRIPT_PATTERNS } from './script-pattern.js'
export { tableCellStrategy, looksLikeReactionCell, SMILES_CELL_PATTERN } from './table-cell.js'
