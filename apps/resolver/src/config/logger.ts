import { createLogger } from '@aerochart/logger'

export const logger = createLogger('resolver')

export const loggers = {
  charts: logger.child('charts'),
  http: logger.child('http'),
  cli: logger.child('cli'),
}
