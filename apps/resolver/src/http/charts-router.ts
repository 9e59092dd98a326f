import { Router, type NextFunction, type Request, type Response } from 'express'
import type { Router as RouterType } from 'express'
import { ChartResolutionError } from '../charts/errors.js'
import { identifierSchema } from '../charts/identifier.js'
import { groupByCategory, type ChartResolver } from '../charts/resolver.js'
import { CHART_CATEGORIES, isChartCategory, type ChartCategory } from '../charts/types.js'
import { InvalidRequestError } from './errors.js'

export type ChartRoutesResolver = Pick<ChartResolver, 'resolve' | 'listSources'>

function parseIdentifier(raw: string): string {
  const parsed = identifierSchema.safeParse(raw)
  if (!parsed.success) {
    const reason = parsed.error.issues[0]?.message ?? 'invalid'
    throw new InvalidRequestError(`Invalid airport identifier "${raw}": ${reason}`)
  }
  return parsed.data
}

function parseCategory(raw: string): ChartCategory {
  if (!isChartCategory(raw)) {
    throw new InvalidRequestError(
      `Unknown category "${raw}". Expected one of: ${CHART_CATEGORIES.join(', ')}`
    )
  }
  return raw
}

/** Aborts when the client goes away before the response is written. */
function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController()
  res.on('close', () => {
    if (!res.writableEnded) controller.abort()
  })
  return controller.signal
}

export function createChartsRouter(resolver: ChartRoutesResolver): RouterType {
  const router: RouterType = Router()

  router.get('/sources', (_req: Request, res: Response) => {
    res.json({ sources: resolver.listSources() })
  })

  const handleCharts = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const identifier = parseIdentifier(req.params.icao ?? '')
      const category =
        req.params.category === undefined ? undefined : parseCategory(req.params.category)
      const sourceId =
        typeof req.query.source === 'string' && req.query.source ? req.query.source : undefined

      const result = await resolver.resolve(identifier, { sourceId, signal: disconnectSignal(res) })
      if (!result.ok) throw new ChartResolutionError(result.failure)

      const charts = category
        ? result.charts.filter((chart) => chart.category === category)
        : result.charts
      res.json({
        identifier: result.identifier,
        source: result.source,
        fetchedAt: result.fetchedAt.toISOString(),
        count: charts.length,
        charts,
        byCategory: groupByCategory(charts),
      })
    } catch (error) {
      next(error)
    }
  }

  router.get('/:icao', handleCharts)
  router.get('/:icao/:category', handleCharts)

  return router
}
