import type { ExtractInput } from '../../adapters/static-html.js'
import { referencesIdentifier } from '../../adapters/fragment-filtered.js'
import { cleanText } from '../../kit/html.js'
import type { ExtractResult, RawChart } from '../../types.js'

/**
 * Search results render as table rows: the first cell names the chart
 * (and the aerodrome), the download link sits somewhere in the row.
 */
export function extractAnacCharts({ $, identifier }: ExtractInput): ExtractResult {
  const rawCharts: RawChart[] = []

  $('tr').each((_, row) => {
    const name = cleanText($(row).children('td').first())
    if (!referencesIdentifier(name, identifier)) return

    const locator = $(row).find("a[href*='descarga']").first().attr('href')?.trim()
    if (!locator) return
    rawCharts.push({ title: name, locator })
  })

  if (rawCharts.length === 0 && !referencesIdentifier($('body').text(), identifier)) {
    return {
      ok: false,
      reason: 'AIRPORT_NOT_FOUND',
      details: `AIP Argentina search found nothing for ${identifier}`,
    }
  }
  return { ok: true, rawCharts }
}
