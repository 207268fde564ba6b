/**
 * Harvester loggers
 *
 * One child logger per pipeline component so every line carries its component path
 * (e.g. `[harvester:fetcher]`).
 */

import { createLogger } from '@routepulse/logger'

export const logger = createLogger('harvester')

export const loggers = {
  fetcher: logger.child('fetcher'),
  parser: logger.child('parser'),
  loader: logger.child('loader'),
  orchestrator: logger.child('orchestrator'),
}
