/**
 * Discovery Logger Configuration
 *
 * Pre-configured loggers for discovery components
 */

import { createLogger } from '@certmap/logger'

export const logger = createLogger('discovery')

export const loggers = {
  orchestrator: logger.child('orchestrator'),
  mapper: logger.child('mapper'),
  extraction: logger.child('extraction'),
  categorizer: logger.child('categorizer'),
  quality: logger.child('quality'),
  firecrawl: logger.child('firecrawl'),
  cli: logger.child('cli'),
}
