import { createStaticHtmlAdapter } from '../../adapters/static-html.js'
import { extractDeceaCharts } from './extract.js'

export const deceaAdapter = createStaticHtmlAdapter({
  pageUrl: ({ identifier, baseEndpoint }) =>
    `${baseEndpoint}?i=aerodromos&codigo=${encodeURIComponent(identifier)}`,
  extract: extractDeceaCharts,
})
