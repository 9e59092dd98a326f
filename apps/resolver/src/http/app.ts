/**
 * Express app without server startup, for supertest and server.ts.
 */

import express, { type Express } from 'express'
import type { ILogger } from '@aerochart/logger'
import { createChartsRouter, type ChartRoutesResolver } from './charts-router.js'
import { createErrorHandler, errorBody } from './errors.js'
import { createRequestLogger } from './request-logger.js'

export interface AppDeps {
  resolver: ChartRoutesResolver
  logger: ILogger
}

export function createApp({ resolver, logger }: AppDeps): Express {
  const app = express()
  app.disable('x-powered-by')
  app.use(createRequestLogger(logger))

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  app.use('/charts', createChartsRouter(resolver))

  app.use((_req, res) => {
    res.status(404).json(errorBody('RouteNotFound', 'No such route'))
  })
  app.use(createErrorHandler(logger))

  return app
}
