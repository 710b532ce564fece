import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { pathToFileURL } from 'node:url'
import { processPage, ReactionStore } from '../../scraper/index.js'
import { toExportedReaction } from '../../writer/index.js'

interface ExtractCommandArgs {
  file: string
  url?: string
  recordProvenance: boolean
  acceptEmptyProducts: boolean
  now?: () => Date
}

/**
 * Run the extraction pipeline over a saved page. No network.
 */
export async function runExtractCommand(args: ExtractCommandArgs): Promise<number> {
  if (!args.file) {
    console.error('Missing --file <path>')
    return 2
  }

  const filePath = resolve(args.file)
  let html: string
  try {
    html = await readFile(filePath, 'utf8')
  } catch (error) {
    console.error(`Unable to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
    return 2
  }

  const sourceUrl = args.url || pathToFileURL(filePath).href
  const scrapedAt = (args.now ?? (() => new Date()))().toISOString()
  const page = processPage(html, sourceUrl, { scrapedAt, recordProvenance: args.recordProvenance })

  const store = new ReactionStore({
    productPolicy: args.acceptEmptyProducts ? 'accept-any' : 'reject-empty-products',
  })
  page.records.forEach(record => store.insert(record))

  console.log(
    JSON.stringify(
      {
        source_url: sourceUrl,
        candidates: page.candidates.length,
        discarded: page.discarded.map(candidate => candidate.text),
        reactions: store.exportAll().map(toExportedReaction),
      },
      null,
      2
    )
  )
  return 0
}
