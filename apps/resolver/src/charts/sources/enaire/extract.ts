import type { CheerioAPI } from 'cheerio'
import type { FragmentExtractResult, FragmentLink } from '../../adapters/fragment-filtered.js'
import { cleanText, nearbyTitle } from '../../kit/html.js'

/**
 * The AIP index holds every aerodrome; each one sits in a block whose id
 * is its ICAO code, with PDF links marked by a file-pdf icon.
 */
export function extractEnaireLinks($: CheerioAPI): FragmentExtractResult {
  const links: FragmentLink[] = []

  $('a[href]').each((_, element) => {
    const link = $(element)
    const locator = link.attr('href')?.trim() ?? ''
    const isPdf = link.find('i.fa-file-pdf').length > 0 || /\.pdf(?:$|[?#])/i.test(locator)
    if (!isPdf) return

    const block = link.closest('[id]')
    const heading = cleanText(block.find('h3, h4').first())
    links.push({
      title: nearbyTitle(link),
      locator,
      nearbyText: `${block.attr('id') ?? ''} ${heading}`.trim(),
    })
  })

  if (links.length === 0) {
    return { ok: false, reason: 'PAGE_STRUCTURE_CHANGED', details: 'AIP index has no PDF links' }
  }
  return { ok: true, links }
}
