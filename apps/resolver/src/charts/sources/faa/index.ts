import { createStaticHtmlAdapter } from '../../adapters/static-html.js'
import { extractFaaCharts } from './extract.js'

/** NFDC looks airports up by FAA location id: KJFK -> JFK. */
export function faaLocationId(identifier: string): string {
  return /^K[A-Z0-9]{3}$/.test(identifier) ? identifier.slice(1) : identifier
}

export const faaAdapter = createStaticHtmlAdapter({
  pageUrl: ({ identifier, baseEndpoint }) =>
    `${baseEndpoint}airportDisplay.jsp?airportId=${encodeURIComponent(faaLocationId(identifier))}`,
  extract: extractFaaCharts,
})
