/**
 * Resolution Orchestrator.
 *
 * identifier -> registry -> adapter (under a hard timeout) -> URL resolver
 * + categorizer -> frozen ChartRecords. Adapter failures pass through with
 * their kind unchanged.
 */

import type { SourceDescriptor } from '@aerochart/chart-sources'
import type { ILogger } from '@aerochart/logger'
import type { TimeoutBudget } from '../config/index.js'
import type { BrowserSessionPool } from './browser/session-pool.js'
import { categorize } from './categorize.js'
import type { ChartResolutionFailure } from './errors.js'
import type { PageFetcher } from './fetch/http-fetcher.js'
import { identifierSchema } from './identifier.js'
import type { OfflineChartStore } from './offline/json-store.js'
import {
  normalizeIdentifier,
  type PrefixRoute,
  type SourceRegistry,
  type SourceSummary,
} from './registry.js'
import {
  adapterFailure,
  type AdapterContext,
  type AdapterResult,
  type ChartAdapter,
  type ChartCategory,
  type ChartRecord,
  type RawChart,
} from './types.js'
import { ChartUrlResolver, fileNameFromUrl } from './url.js'

export type ResolveResult =
  | {
      ok: true
      identifier: string
      source: { id: string; name: string }
      charts: readonly ChartRecord[]
      fetchedAt: Date
    }
  | { ok: false; failure: ChartResolutionFailure }

export interface ResolveOptions {
  /** Bypass prefix routing and use this source */
  sourceId?: string
  /** Caller cancellation; surfaces as BackendTimeout */
  signal?: AbortSignal
}

export interface ChartResolverDeps {
  registry: SourceRegistry
  adapterFor: (sourceId: string) => ChartAdapter | undefined
  fetcher: PageFetcher
  timeouts: TimeoutBudget
  logger: ILogger
  browserPool?: BrowserSessionPool
  offlineStore?: OfflineChartStore
  now?: () => Date
}

export class ChartResolver {
  private readonly now: () => Date

  constructor(private readonly deps: ChartResolverDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  listSources(): SourceSummary[] {
    return this.deps.registry.listSources()
  }

  listPrefixes(): PrefixRoute[] {
    return this.deps.registry.listPrefixes()
  }

  async resolve(identifier: string, options: ResolveOptions = {}): Promise<ResolveResult> {
    const parsed = identifierSchema.safeParse(identifier)
    if (!parsed.success) {
      return {
        ok: false,
        failure: {
          kind: 'UnknownSource',
          identifier: normalizeIdentifier(identifier),
          details: parsed.error.issues[0]?.message ?? 'Invalid airport identifier',
        },
      }
    }

    const normalized = parsed.data
    const lookup = this.lookup(normalized, options.sourceId)
    if (!lookup.ok) {
      this.deps.logger.info('No chart source for identifier', {
        identifier: normalized,
        sourceId: options.sourceId,
      })
      return lookup
    }

    const descriptor = lookup.descriptor
    const adapter = this.deps.adapterFor(descriptor.id)
    if (!adapter || adapter.kind !== descriptor.adapterKind) {
      throw new Error(
        `Chart source ${descriptor.id} has no ${descriptor.adapterKind} adapter registered`
      )
    }

    const log = this.deps.logger.child(descriptor.id, { identifier: normalized })
    const startedAt = Date.now()
    const outcome = await this.invoke(adapter, normalized, descriptor, log, options.signal)

    if (!outcome.ok) {
      log.warn('Chart resolution failed', {
        kind: outcome.kind,
        details: outcome.details,
        durationMs: Date.now() - startedAt,
      })
      return {
        ok: false,
        failure: {
          kind: outcome.kind,
          identifier: normalized,
          sourceId: descriptor.id,
          details: outcome.details,
        },
      }
    }

    const charts = buildChartRecords(outcome.pageUrl, outcome.rawCharts, log)
    log.info('Resolved charts', {
      raw: outcome.rawCharts.length,
      charts: charts.length,
      durationMs: Date.now() - startedAt,
    })

    return {
      ok: true,
      identifier: normalized,
      source: { id: descriptor.id, name: descriptor.name },
      charts,
      fetchedAt: this.now(),
    }
  }

  private lookup(
    identifier: string,
    sourceId: string | undefined
  ): { ok: true; descriptor: SourceDescriptor } | { ok: false; failure: ChartResolutionFailure } {
    if (sourceId === undefined) return this.deps.registry.resolve(identifier)

    const descriptor = this.deps.registry.get(sourceId)
    if (!descriptor) {
      return {
        ok: false,
        failure: {
          kind: 'UnknownSource',
          identifier,
          details: `No chart source with id "${sourceId}"`,
        },
      }
    }
    return { ok: true, descriptor }
  }

  /**
   * Run the adapter against its timeout class. Whichever settles first
   * wins; on expiry the adapter's signal aborts so it can release what it
   * holds.
   */
  private async invoke(
    adapter: ChartAdapter,
    identifier: string,
    descriptor: SourceDescriptor,
    log: ILogger,
    callerSignal: AbortSignal | undefined
  ): Promise<AdapterResult> {
    if (callerSignal?.aborted) {
      return adapterFailure('BackendTimeout', 'Cancelled before the source was contacted')
    }

    const budgetMs = this.deps.timeouts[descriptor.timeoutClass]
    const controller = new AbortController()
    let timedOut = false
    let timer: ReturnType<typeof setTimeout> | undefined

    const onCallerAbort = () => controller.abort()
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true })

    const deadline = new Promise<AdapterResult>((resolve) => {
      controller.signal.addEventListener(
        'abort',
        () =>
          resolve(
            adapterFailure(
              'BackendTimeout',
              timedOut
                ? `${descriptor.id} exceeded its ${descriptor.timeoutClass} budget of ${budgetMs}ms`
                : 'Cancelled by caller'
            )
          ),
        { once: true }
      )
      timer = setTimeout(() => {
        timedOut = true
        controller.abort()
      }, budgetMs)
    })

    const context: AdapterContext = {
      fetcher: this.deps.fetcher,
      signal: controller.signal,
      logger: log,
      browserPool: this.deps.browserPool,
      offlineStore: this.deps.offlineStore,
      now: this.now,
    }

    const running = adapter.fetch(identifier, descriptor, context)
    try {
      return await Promise.race([running, deadline])
    } finally {
      clearTimeout(timer)
      callerSignal?.removeEventListener('abort', onCallerAbort)
      if (controller.signal.aborted) {
        void running.then(
          (late) => log.debug('Adapter settled after its deadline', { ok: late.ok }),
          (error: unknown) => log.warn('Adapter failed after its deadline', {}, error)
        )
      }
    }
  }
}

/**
 * Normalize raw adapter output in emission order. Locators that do not
 * resolve and repeated URLs are dropped; an empty title falls back to
 * the file name.
 */
export function buildChartRecords(
  pageUrl: string,
  rawCharts: readonly RawChart[],
  log?: ILogger
): ChartRecord[] {
  const urls = new ChartUrlResolver()
  const records: ChartRecord[] = []

  for (const raw of rawCharts) {
    const resolved = urls.resolve(raw.locator, pageUrl)
    if (!resolved.ok) {
      log?.debug('Dropped chart', {
        reason: resolved.reason,
        details: resolved.details,
        title: raw.title,
      })
      continue
    }

    const title = raw.title.replace(/\s+/g, ' ').trim() || fileNameFromUrl(resolved.url)
    if (!title) {
      log?.debug('Dropped chart', { reason: 'MISSING_TITLE', url: resolved.url })
      continue
    }

    const category = categorize(title, raw.sectionHint)
    records.push(Object.freeze({ title, url: resolved.url, category }))
  }

  return records
}

/** Charts keyed by category, in taxonomy order, each list in emission order. */
export function groupByCategory(
  charts: readonly ChartRecord[]
): Record<ChartCategory, ChartRecord[]> {
  const out: Record<ChartCategory, ChartRecord[]> = {
    General: [],
    Ground: [],
    DepartureProcedure: [],
    ArrivalProcedure: [],
    Approach: [],
  }
  for (const chart of charts) {
    out[chart.category].push(chart)
  }
  return out
}
