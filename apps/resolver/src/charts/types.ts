/**
 * Chart resolution core types.
 */

import type { ILogger } from '@aerochart/logger'
import type { AdapterKind, SourceDescriptor } from '@aerochart/chart-sources'
import type { FailureKind } from './errors.js'
import type { PageFetcher } from './fetch/http-fetcher.js'
import type { BrowserSessionPool } from './browser/session-pool.js'
import type { OfflineChartStore } from './offline/json-store.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Taxonomy
// ═══════════════════════════════════════════════════════════════════════════════

/** Fixed chart taxonomy, in display order. */
export const CHART_CATEGORIES = [
  'General',
  'Ground',
  'DepartureProcedure',
  'ArrivalProcedure',
  'Approach',
] as const

export type ChartCategory = (typeof CHART_CATEGORIES)[number]

export function isChartCategory(value: string): value is ChartCategory {
  return (CHART_CATEGORIES as readonly string[]).includes(value)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Adapter output before categorization and URL normalization.
 * `locator` is absolute or relative to the adapter's page URL.
 */
export interface RawChart {
  title: string
  locator: string
  /** Category implied by the page section the link sat in */
  sectionHint?: ChartCategory
}

/** Final normalized unit. Frozen on construction. */
export interface ChartRecord {
  readonly title: string
  readonly url: string
  readonly category: ChartCategory
}

// ═══════════════════════════════════════════════════════════════════════════════
// Adapter contract
// ═══════════════════════════════════════════════════════════════════════════════

export type AdapterResult =
  | { ok: true; pageUrl: string; rawCharts: RawChart[] }
  | { ok: false; kind: FailureKind; details: string }

/**
 * Everything an adapter may touch during one fetch.
 * The signal aborts when the orchestrator's timeout expires.
 */
export interface AdapterContext {
  fetcher: PageFetcher
  signal: AbortSignal
  logger: ILogger
  browserPool?: BrowserSessionPool
  offlineStore?: OfflineChartStore
  now: () => Date
}

export interface ChartAdapter {
  /** Must equal the descriptor's adapterKind */
  readonly kind: AdapterKind
  fetch(
    identifier: string,
    descriptor: SourceDescriptor,
    context: AdapterContext
  ): Promise<AdapterResult>
}

/**
 * Outcome of parsing one fetched document.
 */
export type ExtractFailureReason =
  | 'AIRPORT_NOT_FOUND' // the page says so explicitly
  | 'PAGE_STRUCTURE_CHANGED' // expected container missing
  | 'BLOCKED_PAGE'

export type ExtractResult =
  | { ok: true; rawCharts: RawChart[] }
  | { ok: false; reason: ExtractFailureReason; details?: string }

const EXTRACT_FAILURE_KINDS: Record<ExtractFailureReason, FailureKind> = {
  AIRPORT_NOT_FOUND: 'NotFound',
  PAGE_STRUCTURE_CHANGED: 'ParseMismatch',
  BLOCKED_PAGE: 'UpstreamUnavailable',
}

export function extractFailureKind(reason: ExtractFailureReason): FailureKind {
  return EXTRACT_FAILURE_KINDS[reason]
}

export function fromExtractResult(pageUrl: string, result: ExtractResult): AdapterResult {
  if (result.ok) return adapterSuccess(pageUrl, result.rawCharts)
  return adapterFailure(
    extractFailureKind(result.reason),
    result.details ?? `${result.reason} at ${pageUrl}`
  )
}

export function adapterFailure(kind: FailureKind, details: string): AdapterResult {
  return { ok: false, kind, details }
}

export function adapterSuccess(pageUrl: string, rawCharts: RawChart[]): AdapterResult {
  return { ok: true, pageUrl, rawCharts }
}
