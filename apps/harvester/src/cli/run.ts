import { runExtractCommand } from './commands/extract.js'
import { runScrapeCommand, type ScrapeCommandDeps } from './commands/scrape.js'
import { runSplitCommand } from './commands/split.js'
import { asString, asSwitch, parseFlags } from './parse-flags.js'

export function printHelp(): void {
  console.log('Reaction Harvest CLI')
  console.log('')
  console.log('Commands:')
  console.log('  scrape [--doi <doi>] [--max-pages 20] [--delay-min 0.5] [--delay-max 1.5] [--page-size 10]')
  console.log('         [--output kmt_reactions.json] [--csv <path>] [--base-url <url>] [--timeout-ms 30000]')
  console.log('         [--provenance] [--accept-empty-products]')
  console.log('  extract --file <page.html> [--url <source-url>] [--provenance] [--accept-empty-products]')
  console.log('  split <reaction-smiles>')
}

/**
 * Dispatch a command. Returns the process exit code.
 */
export async function runCli(argv: string[], deps: ScrapeCommandDeps = {}): Promise<number> {
  const [command, ...rest] = argv
  if (!command || command === '--help' || command === '-h' || command === 'help') {
    printHelp()
    return 0
  }

  const { positionals, flags } = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  switch (command) {
    case 'scrape':
      return runScrapeCommand(
        {
          doi: asString(flags.doi),
          baseUrl: asString(flags['base-url']),
          maxPages: asString(flags['max-pages']),
          delayMinSeconds: asString(flags['delay-min']),
          delayMaxSeconds: asString(flags['delay-max']),
          pageSize: asString(flags['page-size']),
          output: asString(flags.output),
          csvOutput: asString(flags.csv),
          timeoutMs: asString(flags['timeout-ms']),
          recordProvenance: asSwitch(flags.provenance),
          acceptEmptyProducts: asSwitch(flags['accept-empty-products']),
        },
        deps
      )
    case 'extract':
      return runExtractCommand({
        file: asString(flags.file) ?? '',
        url: asString(flags.url),
        recordProvenance: asSwitch(flags.provenance) ?? false,
        acceptEmptyProducts: asSwitch(flags['accept-empty-products']) ?? false,
        now: deps.now,
      })
    case 'split':
      return runSplitCommand({ reaction: positionals.join(' ') })
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return 2
  }
}
