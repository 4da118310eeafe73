/**
 * Harvester loggers, one child per pipeline component.
 */

import { createLogger } from '@sorteo/logger'

export const logger = createLogger('harvester')

export const loggers = {
  pipeline: logger.child('pipeline'),
  fetcher: logger.child('fetcher'),
  store: logger.child('store'),
  metrics: logger.child('metrics'),
  cli: logger.child('cli'),
}
