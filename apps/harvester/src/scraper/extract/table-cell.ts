import type { CheerioAPI } from 'cheerio'
import type { CandidateStrategy } from '../types.js'
import { strippedText } from '../kit/html.js'
import { SELECTORS } from './selectors.js'

/**
 * Letters, digits and the SMILES punctuation this source uses. Anything else
 * (spaces, commas, colons) means the cell is prose, not a reaction.
 */
export const SMILES_CELL_PATTERN = /^[A-Za-z0-9\[\]()=#@+\-\\/.>]+$/

export function looksLikeReactionCell(text: string): boolean {
  return text.includes('>') && text.includes('.') && SMILES_CELL_PATTERN.test(text)
}

export const tableCellStrategy: CandidateStrategy = {
  method: 'table-cell',
  extract($: CheerioAPI): string[] {
    const cells: string[] = []
    $(SELECTORS.tableCells).each((_, cell) => {
      const text = strippedText($, cell)
      if (looksLikeReactionCell(text)) {
        cells.push(text)
      }
    })
    return cells
  },
}
