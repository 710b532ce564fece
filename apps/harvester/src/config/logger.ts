/**
 * Harvester Logger Configuration
 *
 * Pre-configured loggers for harvester components
 */

import { createLogger } from '@reaction-harvest/logger'

export const logger = createLogger('harvester')

export const loggers = {
  scraper: logger.child('scraper'),
  writer: logger.child('writer'),
  cli: logger.child('cli'),
}
