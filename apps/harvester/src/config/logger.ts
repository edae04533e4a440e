import { createLogger } from '@planwatch/logger'

export const logger = createLogger('harvester')

export const loggers = {
  cli: logger.child('cli'),
  source: logger.child('source'),
  pricing: logger.child('pricing'),
  page: logger.child('page'),
  report: logger.child('report'),
}
