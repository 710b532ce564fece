import { loggers } from '../../config/logger.js'
import { loadSettings, type HarvestSettings, type SettingsOverrides } from '../../config/settings.js'
import { classifyHarvestError, ConfigError } from '../../lib/errors.js'
import { HttpFetcher, ReactionStore, runScrape } from '../../scraper/index.js'
import type { Fetcher, ScrapeRunResult, SleepFn } from '../../scraper/index.js'
import { buildExport, writeCsvExport, writeJsonExport } from '../../writer/index.js'

const log = loggers.cli

/** Partial results were written but the run ended on a fetch failure. */
export const EXIT_FETCH_FAILED = 3

export interface ScrapeCommandDeps {
  fetcher?: Fetcher
  sleep?: SleepFn
  now?: () => Date
  signal?: AbortSignal
  env?: Record<string, string | undefined>
}

const SAMPLE_PREVIEW_LENGTH = 80

function printSummary(run: ScrapeRunResult): void {
  console.log('')
  console.log('Summary:')
  console.log(`  total_reactions: ${run.summary.totalReactions}`)
  console.log(`  unique_reactants: ${run.summary.uniqueReactantComponents}`)
  console.log(`  unique_products: ${run.summary.uniqueProductComponents}`)
  console.log(`  doi: ${run.doi}`)
  console.log(`  pages_scraped: ${run.pagesScraped}`)
  console.log(`  stop_reason: ${run.stopReason}`)

  const sample = run.records[0]
  if (sample) {
    const preview =
      sample.reactionSmiles.length > SAMPLE_PREVIEW_LENGTH
        ? `${sample.reactionSmiles.slice(0, SAMPLE_PREVIEW_LENGTH)}...`
        : sample.reactionSmiles
    console.log('')
    console.log('Sample reaction:')
    console.log(`  Full SMILES: ${preview}`)
    console.log(`  Reactants: ${JSON.stringify(sample.reactantSmiles)}`)
    console.log(`  Products: ${JSON.stringify(sample.productSmiles)}`)
  }
}

export async function runScrapeCommand(
  overrides: SettingsOverrides,
  deps: ScrapeCommandDeps = {}
): Promise<number> {
  let settings: HarvestSettings
  try {
    settings = loadSettings(overrides, deps.env)
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message)
      return 2
    }
    throw error
  }

  const fetcher = deps.fetcher ?? new HttpFetcher({ defaults: { timeoutMs: settings.timeoutMs } })
  const store = new ReactionStore({ productPolicy: settings.productPolicy })

  const run = await runScrape(
    {
      doi: settings.doi,
      baseUrl: settings.baseUrl,
      maxPages: settings.maxPages,
      delay: {
        minMs: settings.delayMinSeconds * 1000,
        maxMs: settings.delayMaxSeconds * 1000,
      },
      pageSize: settings.pageSize,
      recordProvenance: settings.recordProvenance,
      timeoutMs: settings.timeoutMs,
    },
    {
      fetcher,
      store,
      logger: loggers.scraper,
      sleep: deps.sleep,
      now: deps.now,
      signal: deps.signal,
    }
  )

  printSummary(run)

  // Partial results are persisted whatever the stop reason.
  const exportedAt = (deps.now ?? (() => new Date()))()
  await writeJsonExport(settings.output, buildExport(run, exportedAt))
  console.log(`Data saved to ${settings.output}`)
  if (settings.csvOutput) {
    await writeCsvExport(settings.csvOutput, run.records)
    console.log(`Data saved to ${settings.csvOutput}`)
  }

  if (run.stopReason === 'fetch_failed') {
    const classified = classifyHarvestError(run.error)
    log.warn('Run ended early on fetch failure; partial results saved', {
      code: classified.code,
      retryable: classified.retryable,
      reactions: run.records.length,
    })
    return EXIT_FETCH_FAILED
  }

  return 0
}
