import type { ExtractInput } from '../../adapters/static-html.js'
import { cleanText, loadHtml } from '../../kit/html.js'
import type { ExtractResult, RawChart } from '../../types.js'

const AIRAC_FOLDER = /\d{4}-\d{1,2}-\d{1,2}-AIRAC/g

/**
 * Publication folders listed on the history page. Links are preferred;
 * the raw text is a fallback for pages that only print the folder names.
 */
export function extractAiracFolders(body: string): string[] {
  const $ = loadHtml(body)
  const fromLinks = new Set<string>()
  $('a[href]').each((_, link) => {
    for (const match of ($(link).attr('href') ?? '').match(AIRAC_FOLDER) ?? []) {
      fromLinks.add(match)
    }
  })
  if (fromLinks.size > 0) return [...fromLinks]
  return [...new Set(body.match(AIRAC_FOLDER) ?? [])]
}

/**
 * AD 2 pages carry chart tables whose header mentions "chart" (English)
 * or "kart" (Norwegian): title in the first cell, PDF in the second.
 */
export function extractAvinorCharts({ $ }: ExtractInput): ExtractResult {
  const tables = $('table')
  if (tables.length === 0) {
    return { ok: false, reason: 'PAGE_STRUCTURE_CHANGED', details: 'AD 2 page has no tables' }
  }

  const rawCharts: RawChart[] = []
  tables.each((_, table) => {
    const header = $(table)
      .find('th')
      .map((_, th) => cleanText($(th)).toLowerCase())
      .get()
      .join(' ')
    if (!header.includes('chart') && !header.includes('kart')) return

    $(table)
      .find('tr')
      .each((_, row) => {
        const cells = $(row).children('td')
        if (cells.length < 2) return

        const link = cells.eq(1).find('a[href]').first()
        const locator = link.attr('href')?.trim() ?? ''
        if (!locator.toLowerCase().includes('.pdf')) return

        const nameCell = cells.eq(0)
        const paragraph = nameCell.find('p').first()
        const name = paragraph.length > 0 ? cleanText(paragraph) : cleanText(nameCell)
        const title = name || cleanText(link)
        rawCharts.push({ title, locator })
      })
  })

  return { ok: true, rawCharts }
}
