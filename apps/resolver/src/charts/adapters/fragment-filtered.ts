/**
 * FragmentFiltered adapter: one document lists every airport and the
 * airport is addressed by URL fragment. The server never sees the
 * fragment, so links are filtered here to the requested airport.
 */

import type { CheerioAPI } from 'cheerio'
import { fetchPage } from '../kit/http.js'
import { loadHtml } from '../kit/html.js'
import {
  adapterFailure,
  adapterSuccess,
  extractFailureKind,
  type ChartAdapter,
  type ExtractFailureReason,
  type RawChart,
} from '../types.js'
import { discoverVersion, type VersionDiscovery, type VersionPointer } from '../version.js'

/** A link plus the text around it, before filtering. */
export interface FragmentLink extends RawChart {
  nearbyText: string
}

export type FragmentExtractResult =
  | { ok: true; links: FragmentLink[] }
  | { ok: false; reason: ExtractFailureReason; details?: string }

export interface FragmentFilteredAdapterOptions {
  /** Document URL without fragment */
  documentUrl: (input: { baseEndpoint: string; version?: VersionPointer }) => string
  version?: VersionDiscovery
  extractLinks: ($: CheerioAPI, documentUrl: string) => FragmentExtractResult
}

const AIRPORT_TOKEN = /(?<![A-Z0-9])[A-Z]{4}(?![A-Z0-9])/g

function tokenPattern(identifier: string): RegExp {
  const escaped = identifier.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
  return new RegExp(`(?<![A-Z0-9])${escaped}(?![A-Z0-9])`)
}

/** Whether `text` names `identifier` as a whole token, ignoring case. */
export function referencesIdentifier(text: string, identifier: string): boolean {
  return tokenPattern(identifier.toUpperCase()).test(text.toUpperCase())
}

/**
 * Whether a locator names a different airport of the same country prefix,
 * e.g. `.../LEBL/LE_AD_2_LEBL_ADC_en.pdf` when resolving LEMD.
 */
export function namesOtherAirport(locator: string, identifier: string): boolean {
  const target = identifier.toUpperCase()
  const country = target.slice(0, 2)
  const tokens = locator.toUpperCase().match(AIRPORT_TOKEN) ?? []
  return tokens.some((token) => token !== target && token.startsWith(country))
}

export function belongsToAirport(link: FragmentLink, identifier: string): boolean {
  if (namesOtherAirport(link.locator, identifier)) return false
  return (
    referencesIdentifier(link.locator, identifier) ||
    referencesIdentifier(link.title, identifier) ||
    referencesIdentifier(link.nearbyText, identifier)
  )
}

export function createFragmentFilteredAdapter(
  options: FragmentFilteredAdapterOptions
): ChartAdapter {
  return {
    kind: 'FragmentFiltered',
    async fetch(identifier, descriptor, context) {
      let version: VersionPointer | undefined
      if (options.version) {
        const resolved = await discoverVersion(context, descriptor.baseEndpoint, options.version)
        if (!resolved.ok) return adapterFailure(resolved.kind, resolved.details)
        version = resolved.version
      }

      const documentUrl = options.documentUrl({ baseEndpoint: descriptor.baseEndpoint, version })
      const page = await fetchPage(context, documentUrl)
      if (!page.ok) return adapterFailure(page.kind, page.details)

      const $ = loadHtml(page.body)
      const extracted = options.extractLinks($, page.finalUrl)
      if (!extracted.ok) {
        return adapterFailure(
          extractFailureKind(extracted.reason),
          extracted.details ?? `${extracted.reason} at ${documentUrl}`
        )
      }

      const own = extracted.links.filter((link) => belongsToAirport(link, identifier))
      context.logger.debug('Filtered shared document', {
        identifier,
        total: extracted.links.length,
        kept: own.length,
      })

      // No links and no mention anywhere: the airport is not in this document
      if (own.length === 0 && !referencesIdentifier($.root().text(), identifier)) {
        return adapterFailure('NotFound', `${identifier} does not appear in ${documentUrl}`)
      }

      const pageUrl = `${page.finalUrl.split('#')[0]}#${identifier}`
      const rawCharts: RawChart[] = own.map(({ title, locator, sectionHint }) =>
        sectionHint ? { title, locator, sectionHint } : { title, locator }
      )
      return adapterSuccess(pageUrl, rawCharts)
    },
  }
}
