import { createFragmentFilteredAdapter } from '../../adapters/fragment-filtered.js'
import { extractEnaireLinks } from './extract.js'

export const enaireAdapter = createFragmentFilteredAdapter({
  documentUrl: ({ baseEndpoint }) => `${baseEndpoint}aip-en.html`,
  extractLinks: ($) => extractEnaireLinks($),
})
