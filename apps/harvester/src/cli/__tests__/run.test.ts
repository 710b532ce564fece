import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { Fetcher, FetchResult } from '../../scraper/types.js'
import { EXIT_FETCH_FAILED } from '../commands/scrape.js'
import { runCli } from '../run.js'

const BASE = 'https://reactions.example.test'
const DOI = '10.1000/test-doi'
const NOW = new Date('2024-01-01T00:00:00.000Z')
const FIXTURE = fileURLToPath(new URL('../../scraper/__tests__/fixtures/listing-page.html', import.meta.url))

const pageUrl = (start: number) => `${BASE}/data/reaction/doi/${DOI}/start/${start}`

function fetcherFor(pages: Record<string, string>): Fetcher & { calls: string[] } {
  const calls: string[] = []
  return {
    calls,
    async fetch(url): Promise<FetchResult> {
      calls.push(url)
      const html = pages[url]
      return html === undefined
        ? { status: 'error', statusCode: 500, error: 'HTTP 500: Internal Server Error', durationMs: 1, attempts: 3 }
        : { status: 'ok', statusCode: 200, html, durationMs: 1, attempts: 1 }
    },
  }
}

function loggedLines(): string[] {
  return vi.mocked(console.log).mock.calls.map(call => String(call[0]))
}

describe('runCli', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints help with no command', async () => {
    expect(await runCli([])).toBe(0)
    expect(loggedLines()[0]).toBe('Reaction Harvest CLI')
  })

  it('rejects an unknown command', async () => {
    expect(await runCli(['crawl'])).toBe(2)
    expect(console.error).toHaveBeenCalledWith('Unknown command: crawl')
  })

  describe('split', () => {
    it('prints the split roles as JSON', async () => {
      expect(await runCli(['split', 'CCO.[Na]>[Pt]>CC=O'])).toBe(0)
      expect(JSON.parse(loggedLines()[0])).toEqual({
        reactants: ['CCO', '[Na]'],
        reagents: ['[Pt]'],
        products: ['CC=O'],
        canonical: 'CCO.[Na]>[Pt]>CC=O',
      })
    })

    it('fails on text without an arrow', async () => {
      expect(await runCli(['split', 'CCO.O'])).toBe(1)
      expect(console.error).toHaveBeenCalledWith("Not a reaction string (no '>' found): CCO.O")
    })

    it('requires an argument', async () => {
      expect(await runCli(['split'])).toBe(2)
    })
  })

  describe('extract', () => {
    it('runs the pipeline over a saved page', async () => {
      const code = await runCli(['extract', '--file', FIXTURE, '--url', pageUrl(0), '--provenance'], { now: () => NOW })

      expect(code).toBe(0)
      const output = JSON.parse(loggedLines()[0])
      expect(output.source_url).toBe(pageUrl(0))
      expect(output.candidates).toBe(6)
      expect(output.discarded).toEqual([])
      expect(output.reactions).toHaveLength(6)
      expect(output.reactions[5]).toEqual({
        reaction_smiles: 'CN.O=CC>>CNCC',
        reactant_smiles: ['CN', 'O=CC'],
        reagent_smiles: [],
        product_smiles: ['CNCC'],
        source_url: pageUrl(0),
        scraped_at: '2024-01-01T00:00:00.000Z',
        extraction_method: 'table-cell',
      })
    })

    it('requires --file', async () => {
      expect(await runCli(['extract'])).toBe(2)
      expect(console.error).toHaveBeenCalledWith('Missing --file <path>')
    })

    it('fails on an unreadable file', async () => {
      expect(await runCli(['extract', '--file', join(tmpdir(), 'no-such-page-for-extract.html')])).toBe(2)
    })
  })

  describe('scrape', () => {
    let dir: string

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'reaction-cli-'))
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it('scrapes, prints a summary and writes both exports', async () => {
      const fetcher = fetcherFor({
        [pageUrl(0)]: '<div data-reaction-smiles="CCO.O>>CC=O"></div>',
        [pageUrl(10)]: '<div data-reaction-smiles="CCO.N>>CC=O.O"></div>',
      })
      const output = join(dir, 'reactions.json')
      const csv = join(dir, 'reactions.csv')

      const code = await runCli(
        ['scrape', '--doi', DOI, '--base-url', BASE, '--max-pages', '2', '--output', output, '--csv', csv],
        { fetcher, sleep: async () => {}, now: () => NOW, env: {} }
      )

      expect(code).toBe(0)
      expect(fetcher.calls).toEqual([pageUrl(0), pageUrl(10)])

      const lines = loggedLines()
      expect(lines).toContain('  total_reactions: 2')
      expect(lines).toContain('  unique_reactants: 3')
      expect(lines).toContain('  unique_products: 2')
      expect(lines).toContain('  stop_reason: max_pages')
      expect(lines).toContain('  Full SMILES: CCO.O>>CC=O')
      expect(lines).toContain(`Data saved to ${output}`)

      const saved = JSON.parse(await readFile(output, 'utf8'))
      expect(saved.metadata).toEqual({
        doi: DOI,
        total_reactions: 2,
        scraped_at: '2024-01-01T00:00:00.000Z',
        source: BASE,
      })
      expect(saved.reactions.map((r: { reaction_smiles: string }) => r.reaction_smiles)).toEqual([
        'CCO.O>>CC=O',
        'CCO.N>>CC=O.O',
      ])

      const csvLines = (await readFile(csv, 'utf8')).trimEnd().split('\n')
      expect(csvLines).toHaveLength(3)
      expect(csvLines[1]).toBe(`CCO.O>>CC=O,CCO.O,,CC=O,${pageUrl(0)},2024-01-01T00:00:00.000Z,`)
    })

    it('saves partial results and exits non-zero when a fetch fails', async () => {
      const fetcher = fetcherFor({ [pageUrl(0)]: '<div data-reaction-smiles="A>>B"></div>' })
      const output = join(dir, 'partial.json')

      const code = await runCli(['scrape', '--doi', DOI, '--base-url', BASE, '--output', output], {
        fetcher,
        sleep: async () => {},
        now: () => NOW,
        env: {},
      })

      expect(code).toBe(EXIT_FETCH_FAILED)
      expect(loggedLines()).toContain('  stop_reason: fetch_failed')
      const saved = JSON.parse(await readFile(output, 'utf8'))
      expect(saved.metadata.total_reactions).toBe(1)
    })

    it('refuses invalid settings before fetching', async () => {
      const fetcher = fetcherFor({})

      const code = await runCli(['scrape', '--max-pages', '0'], { fetcher, env: {} })

      expect(code).toBe(2)
      expect(fetcher.calls).toEqual([])
      expect(console.error).toHaveBeenCalledWith('Invalid configuration: maxPages: Number must be greater than 0')
    })
  })
})
