import * as cheerio from 'cheerio'
import type { AnyNode } from 'domhandler'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/**
 * Trimmed, non-empty values of `attr` across every element carrying it,
 * in document order.
 */
export function attrValues($: cheerio.CheerioAPI, attr: string): string[] {
  const values: string[] = []
  $(`[${attr}]`).each((_, element) => {
    const value = $(element).attr(attr)?.trim()
    if (value) {
      values.push(value)
    }
  })
  return values
}

/**
 * Text of `node` with each text node trimmed before joining, so markup
 * indentation and inline wrappers do not leave whitespace in the result.
 */
export function strippedText($: cheerio.CheerioAPI, node: AnyNode): string {
  const children = $(node).contents().toArray()
  if (children.length === 0) {
    return $(node).text().trim()
  }
  return children.map(child => strippedText($, child)).join('')
}
