import type { NextFunction, Request, Response } from 'express'
import type { ILogger } from '@aerochart/logger'

const SKIP_PATHS = new Set(['/health', '/favicon.ico'])

/** One log entry per request, written when the response finishes. */
export function createRequestLogger(log: ILogger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (SKIP_PATHS.has(req.path)) {
      next()
      return
    }

    const startedAt = process.hrtime.bigint()
    res.on('finish', () => {
      const latencyMs = Number(process.hrtime.bigint() - startedAt) / 1e6
      const route = req.route?.path ? `${req.baseUrl}${String(req.route.path)}` : req.path
      const meta = {
        method: req.method,
        route,
        status: res.statusCode,
        latencyMs: Math.round(latencyMs * 100) / 100,
      }
      if (res.statusCode >= 500) log.warn('http.request.end', meta)
      else log.info('http.request.end', meta)
    })
    next()
  }
}
