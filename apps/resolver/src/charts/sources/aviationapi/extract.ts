import { z } from 'zod'
import { flattenListing, type ChartListing } from '../../adapters/json-api.js'
import type { ChartCategory, ExtractResult, RawChart } from '../../types.js'

const chartItemSchema = z.object({
  chart_name: z.string(),
  chart_code: z.string().optional(),
  pdf_path: z.string(),
})

export type AviationApiChart = z.infer<typeof chartItemSchema>

const listingSchema = z.union([
  z.array(chartItemSchema),
  z.record(z.string(), z.array(chartItemSchema)),
])

/** `{ "PANC": [...] }` or, with grouping, `{ "PANC": { "DP": [...], ... } }` */
export const aviationApiResponseSchema = z.record(z.string(), listingSchema)

export type AviationApiResponse = z.infer<typeof aviationApiResponseSchema>

const CODE_HINTS: Record<string, ChartCategory> = {
  APD: 'Ground',
  HOT: 'Ground',
  LAH: 'Ground',
  DP: 'DepartureProcedure',
  ODP: 'DepartureProcedure',
  STAR: 'ArrivalProcedure',
  IAP: 'Approach',
  MIN: 'General',
}

const GROUP_HINTS: Record<string, ChartCategory> = {
  DP: 'DepartureProcedure',
  STAR: 'ArrivalProcedure',
  CAPP: 'Approach',
}

function toRawChart(item: AviationApiChart, group: string | undefined): RawChart {
  const raw: RawChart = { title: item.chart_name, locator: item.pdf_path }
  const hint =
    (item.chart_code ? CODE_HINTS[item.chart_code.toUpperCase()] : undefined) ??
    (group ? GROUP_HINTS[group.toUpperCase()] : undefined)
  if (hint) raw.sectionHint = hint
  return raw
}

export function aviationApiCharts(payload: AviationApiResponse, identifier: string): ExtractResult {
  const listing: ChartListing<AviationApiChart> | undefined = payload[identifier]
  if (!listing) {
    return {
      ok: false,
      reason: 'AIRPORT_NOT_FOUND',
      details: `aviationapi.com has no charts for ${identifier}`,
    }
  }
  return { ok: true, rawCharts: flattenListing(listing, toRawChart) }
}
