/**
 * Chart resolution wiring: shipped registry + adapters over one HTTP
 * fetcher, one browser pool and one offline store.
 */

import type { ILogger } from '@aerochart/logger'
import type { ResolverConfig } from '../config/index.js'
import { PlaywrightSessionPool } from './browser/session-pool.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { JsonFileChartStore } from './offline/json-store.js'
import { getSourceRegistry } from './registry.js'
import { ChartResolver } from './resolver.js'
import { getSourceAdapter } from './sources/index.js'

export interface ChartService {
  resolver: ChartResolver
  /** Shut down the browser pool */
  close(): Promise<void>
}

export function createChartService(config: ResolverConfig, logger: ILogger): ChartService {
  const browserPool = new PlaywrightSessionPool({
    size: config.browser.poolSize,
    executablePath: config.browser.executablePath,
    channel: config.browser.channel,
    userAgent: config.userAgent,
    logger: logger.child('browser'),
  })

  const resolver = new ChartResolver({
    registry: getSourceRegistry(),
    adapterFor: getSourceAdapter,
    fetcher: new HttpFetcher({
      userAgent: config.userAgent,
      // The orchestrator's budget is the real deadline
      defaultTimeoutMs: config.timeouts.slow,
      maxSizeBytes: config.maxPageBytes,
    }),
    timeouts: config.timeouts,
    logger,
    browserPool,
    offlineStore: new JsonFileChartStore(config.offlineDataDir),
  })

  return {
    resolver,
    close: () => browserPool.close(),
  }
}

export { ChartResolver, buildChartRecords, groupByCategory } from './resolver.js'
export type { ChartResolverDeps, ResolveOptions, ResolveResult } from './resolver.js'
export { SourceRegistry, getSourceRegistry, normalizeIdentifier } from './registry.js'
export type { PrefixRoute, SourceSummary } from './registry.js'
export { categorize } from './categorize.js'
export { ChartUrlResolver, resolveLocator } from './url.js'
export { parseVersionTag, selectLatestVersion } from './version.js'
export { ChartResolutionError, describeFailure, httpStatusFor, isRetryable } from './errors.js'
export type { ChartResolutionFailure, FailureKind } from './errors.js'
export { CHART_CATEGORIES, isChartCategory } from './types.js'
export type { ChartAdapter, ChartCategory, ChartRecord, RawChart } from './types.js'
export { SOURCE_ADAPTERS, getSourceAdapter } from './sources/index.js'
