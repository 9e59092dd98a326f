/**
 * JSONApi adapter: one structured request, validated with zod, flattened
 * into title/locator pairs.
 */

import type { z } from 'zod'
import { fetchPage, type FetchPageOptions } from '../kit/http.js'
import { parseJsonWith } from '../kit/json.js'
import {
  adapterFailure,
  fromExtractResult,
  type ChartAdapter,
  type ExtractResult,
  type RawChart,
} from '../types.js'

/**
 * Chart listings arrive either flat or grouped by category:
 * `[{...}, {...}]` or `{ "DP": [{...}], "STAR": [{...}] }`.
 */
export type ChartListing<T> = T[] | Record<string, T[]>

/**
 * Flatten a listing in document order. `toRawChart` sees the group name
 * for grouped listings and may return undefined to skip an item.
 */
export function flattenListing<T>(
  listing: ChartListing<T>,
  toRawChart: (item: T, group: string | undefined) => RawChart | undefined
): RawChart[] {
  const out: RawChart[] = []
  const push = (item: T, group: string | undefined) => {
    const raw = toRawChart(item, group)
    if (raw) out.push(raw)
  }

  if (Array.isArray(listing)) {
    for (const item of listing) push(item, undefined)
  } else {
    for (const [group, items] of Object.entries(listing)) {
      for (const item of items) push(item, group)
    }
  }
  return out
}

export interface JsonApiAdapterOptions<T> {
  requestUrl: (input: { identifier: string; baseEndpoint: string }) => string
  request?: (identifier: string) => FetchPageOptions
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  toRawCharts: (payload: T, identifier: string) => ExtractResult
}

export function createJsonApiAdapter<T>(options: JsonApiAdapterOptions<T>): ChartAdapter {
  return {
    kind: 'JSONApi',
    async fetch(identifier, descriptor, context) {
      const url = options.requestUrl({ identifier, baseEndpoint: descriptor.baseEndpoint })
      const response = await fetchPage(context, url, {
        headers: { Accept: 'application/json' },
        ...options.request?.(identifier),
      })
      if (!response.ok) return adapterFailure(response.kind, response.details)

      const payload = parseJsonWith(response.body, options.schema)
      if (!payload.ok) {
        return adapterFailure('ParseMismatch', `Unexpected JSON from ${url}: ${payload.error}`)
      }

      return fromExtractResult(response.finalUrl, options.toRawCharts(payload.value, identifier))
    },
  }
}
