import * as cheerio from 'cheerio'
import type { AnyNode } from 'domhandler'

export type CheerioSelection = cheerio.Cheerio<AnyNode>

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/** Whitespace-collapsed text of a selection. */
export function cleanText(selection: CheerioSelection): string {
  return selection.text().replace(/\s+/g, ' ').trim()
}

/**
 * Text describing a link: its own text, else the closest row, list item or
 * cell that holds it. Empty when nothing nearby has text.
 */
export function nearbyTitle(link: CheerioSelection): string {
  const own = cleanText(link)
  if (own) return own

  for (const container of ['td', 'li', 'tr', 'div']) {
    const text = cleanText(link.closest(container))
    if (text) return text
  }
  return ''
}
