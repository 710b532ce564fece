import '../env.js'
import { loggers } from '../config/logger.js'
import { runCli } from './run.js'

const controller = new AbortController()
process.once('SIGINT', () => {
  loggers.cli.warn('Interrupted, stopping and saving collected results')
  controller.abort()
})

runCli(process.argv.slice(2), { signal: controller.signal })
  .then(exitCode => {
    process.exit(exitCode)
  })
  .catch(error => {
    loggers.cli.fatal('Command failed', {}, error)
    process.exit(1)
  })
