// Load environment variables first
import './env.js'

import { createChartService } from './charts/index.js'
import { loadConfig } from './config/index.js'
import { loggers } from './config/logger.js'
import { createApp } from './http/app.js'

const log = loggers.http

const config = loadConfig()
const service = createChartService(config, loggers.charts)
const app = createApp({ resolver: service.resolver, logger: log })

const server = app.listen(config.port, () => {
  log.info('Chart API listening', { port: config.port })
})

function shutdown(signal: string): void {
  log.info('Shutting down', { signal })
  server.close()
  service
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      log.error('Browser pool did not close cleanly', {}, error)
      process.exit(1)
    })
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
