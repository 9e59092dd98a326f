import type { ExtractInput } from '../../adapters/static-html.js'
import { referencesIdentifier } from '../../adapters/fragment-filtered.js'
import { cleanText } from '../../kit/html.js'
import type { ChartCategory, ExtractResult, RawChart } from '../../types.js'

/** AISWEB groups charts under h4 headings named by chart type. */
const SECTION_HINTS: ReadonlyMap<string, ChartCategory> = new Map([
  ['ADC', 'Ground'],
  ['AGMC', 'Ground'],
  ['AOC', 'General'],
  ['PDC', 'Ground'],
  ['IAC', 'Approach'],
  ['VAC', 'Approach'],
  ['SID', 'DepartureProcedure'],
  ['STAR', 'ArrivalProcedure'],
])

export function extractDeceaCharts({ $, identifier }: ExtractInput): ExtractResult {
  const rawCharts: RawChart[] = []
  let sections = 0

  $('h4').each((_, heading) => {
    const section = cleanText($(heading))
    const hint = SECTION_HINTS.get(section)
    if (!hint) return
    sections += 1

    $(heading)
      .next()
      .find('a[href]')
      .each((_, link) => {
        const text = cleanText($(link))
        const locator = $(link).attr('href')?.trim() ?? ''
        // Chart documents are served through the download endpoint
        if (!text || !locator.includes('download')) return
        rawCharts.push({ title: `${section} - ${text}`, locator, sectionHint: hint })
      })
  })

  if (sections === 0 && !referencesIdentifier($('body').text(), identifier)) {
    return {
      ok: false,
      reason: 'AIRPORT_NOT_FOUND',
      details: `AISWEB has no aerodrome ${identifier}`,
    }
  }
  return { ok: true, rawCharts }
}
