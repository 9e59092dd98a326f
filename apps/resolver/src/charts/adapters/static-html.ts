/**
 * StaticHTML adapter: fetch the airport page (after resolving the current
 * publication folder when the authority is date-cycled) and extract links
 * with cheerio.
 */

import type { CheerioAPI } from 'cheerio'
import { fetchPage, type FetchPageOptions } from '../kit/http.js'
import { loadHtml } from '../kit/html.js'
import {
  adapterFailure,
  fromExtractResult,
  type ChartAdapter,
  type ExtractResult,
} from '../types.js'
import { discoverVersion, type VersionDiscovery, type VersionPointer } from '../version.js'

export interface PageUrlInput {
  identifier: string
  baseEndpoint: string
  version?: VersionPointer
}

export interface ExtractInput {
  $: CheerioAPI
  identifier: string
  pageUrl: string
}

export interface StaticHtmlAdapterOptions {
  pageUrl: (input: PageUrlInput) => string
  /** Extra request settings for the airport page (method, headers) */
  request?: (identifier: string) => FetchPageOptions
  version?: VersionDiscovery
  extract: (input: ExtractInput) => ExtractResult
}

export function createStaticHtmlAdapter(options: StaticHtmlAdapterOptions): ChartAdapter {
  return {
    kind: 'StaticHTML',
    async fetch(identifier, descriptor, context) {
      let version: VersionPointer | undefined
      if (options.version) {
        const resolved = await discoverVersion(context, descriptor.baseEndpoint, options.version)
        if (!resolved.ok) return adapterFailure(resolved.kind, resolved.details)
        version = resolved.version
      }

      const url = options.pageUrl({ identifier, baseEndpoint: descriptor.baseEndpoint, version })
      const page = await fetchPage(context, url, options.request?.(identifier))
      if (!page.ok) return adapterFailure(page.kind, page.details)

      const extracted = options.extract({
        $: loadHtml(page.body),
        identifier,
        pageUrl: page.finalUrl,
      })
      return fromExtractResult(page.finalUrl, extracted)
    },
  }
}
