import { readFileSync } from 'node:fs'
import { describe, expect, it } from 'vitest'
import { processPage } from '../process/page.js'

const fixture = readFileSync(new URL('./fixtures/listing-page.html', import.meta.url), 'utf8')
const URL_0 = 'https://reactions.example.test/data/reaction/doi/10.1000/test-doi/start/0'
const SCRAPED_AT = '2024-01-01T00:00:00.000Z'

describe('processPage', () => {
  it('turns every splittable candidate into a record', () => {
    const page = processPage(fixture, URL_0, { scrapedAt: SCRAPED_AT })

    expect(page.candidates).toHaveLength(6)
    expect(page.discarded).toEqual([])
    expect(page.records.map(r => r.reactionSmiles)).toEqual([
      'CCO.CC(=O)O>>CC(=O)OCC.O',
      'CCO.[Na]>[Pt]>CC=O',
      'CC(=O)Cl.OCC>>CC(=O)OCC',
      'c1ccccc1Br.OB(O)c1ccccc1>[Pd]>c1ccc(-c2ccccc2)cc1',
      'C=O.N>>CN',
      'CN.O=CC>>CNCC',
    ])
  })

  it('builds records with split roles, source URL and timestamp', () => {
    const page = processPage(fixture, URL_0, { scrapedAt: SCRAPED_AT })

    expect(page.records[1]).toEqual({
      reactionSmiles: 'CCO.[Na]>[Pt]>CC=O',
      reactantSmiles: ['CCO', '[Na]'],
      reagentSmiles: ['[Pt]'],
      productSmiles: ['CC=O'],
      sourceUrl: URL_0,
      scrapedAt: SCRAPED_AT,
    })
  })

  it('tags records with their extraction method when provenance is on', () => {
    const page = processPage(fixture, URL_0, { scrapedAt: SCRAPED_AT, recordProvenance: true })
    expect(page.records.map(r => r.extractionMethod)).toEqual([
      'attribute',
      'attribute',
      'script-pattern',
      'script-pattern',
      'script-pattern',
      'table-cell',
    ])
  })

  it('discards candidates without an arrow', () => {
    const html = '<table><tr><td>A.B>>C</td></tr></table><div data-reaction-smiles="CCO.O"></div>'
    const page = processPage(html, URL_0, { scrapedAt: SCRAPED_AT })

    expect(page.discarded).toEqual([{ text: 'CCO.O', method: 'attribute' }])
    expect(page.records.map(r => r.reactionSmiles)).toEqual(['A.B>>C'])
  })

  it('returns nothing for an empty page', () => {
    const page = processPage('', URL_0, { scrapedAt: SCRAPED_AT })
    expect(page.candidates).toEqual([])
    expect(page.records).toEqual([])
  })
})
