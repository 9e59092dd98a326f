import type { ExtractInput } from '../../adapters/static-html.js'
import { cleanText } from '../../kit/html.js'
import type { ChartCategory, ExtractResult, RawChart } from '../../types.js'

/** Section headings on the airport display page, matched by substring. */
const SECTIONS: ReadonlyArray<{ heading: string; hint?: ChartCategory }> = [
  { heading: 'Standard Terminal Arrival (STAR)', hint: 'ArrivalProcedure' },
  { heading: 'Departure Procedure (DP)', hint: 'DepartureProcedure' },
  { heading: 'Instrument Approach Procedure (IAP)', hint: 'Approach' },
  { heading: 'General' },
  { heading: 'Other' },
  { heading: 'Minimums' },
]

const DIAGRAM_TITLE = /airport diagram|\bAPD\b/i

export function extractFaaCharts({ $, identifier }: ExtractInput): ExtractResult {
  const missing = $('strong').filter((_, el) => $(el).text().includes('Airport Not Found'))
  if (missing.length > 0) {
    return { ok: false, reason: 'AIRPORT_NOT_FOUND', details: `FAA has no airport ${identifier}` }
  }

  // Airports without published procedures have no charts block
  const charts = $('div#charts')
  if (charts.length === 0) {
    return { ok: true, rawCharts: [] }
  }

  const rawCharts: RawChart[] = []
  const diagram = charts.find('a.chartLink').first().attr('href')?.trim()
  if (diagram) {
    rawCharts.push({
      title: `${identifier} - Airport Diagram`,
      locator: diagram,
      sectionHint: 'Ground',
    })
  }

  charts.find('h3').each((_, heading) => {
    const text = cleanText($(heading))
    const section = SECTIONS.find((s) => text.includes(s.heading))
    if (!section) return

    $(heading)
      .parent()
      .find('a[href]')
      .each((_, link) => {
        const title = cleanText($(link))
        const locator = $(link).attr('href')?.trim()
        if (!title || !locator) return

        const hint = section.hint ?? (DIAGRAM_TITLE.test(title) ? 'Ground' : undefined)
        rawCharts.push(hint ? { title, locator, sectionHint: hint } : { title, locator })
      })
  })

  return { ok: true, rawCharts }
}
