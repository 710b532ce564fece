import type { CheerioAPI } from 'cheerio'
import type { CandidateStrategy } from '../types.js'
import { attrValues } from '../kit/html.js'
import { SELECTORS } from './selectors.js'

/**
 * Values of the reaction-SMILES data attribute, verbatim apart from trimming.
 */
export const attributeStrategy: CandidateStrategy = {
  method: 'attribute',
  extract($: CheerioAPI): string[] {
    return attrValues($, SELECTORS.reactionAttr)
  },
}
