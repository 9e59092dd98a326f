import { createStaticHtmlAdapter } from '../../adapters/static-html.js'
import { extractAiracFolders, extractAvinorCharts } from './extract.js'

export const avinorAdapter = createStaticHtmlAdapter({
  version: {
    indexUrl: (baseEndpoint) => `${baseEndpoint}history-no-NO.html`,
    extractCandidates: (body) => extractAiracFolders(body),
    // The history page also lists announced editions
    skipPending: true,
  },
  pageUrl: ({ identifier, baseEndpoint, version }) => {
    if (!version) {
      throw new Error('Avinor airport pages live under a publication folder')
    }
    return `${baseEndpoint}${version.tag}/html/eAIP/EN-AD-2.${identifier}-no-NO.html`
  },
  extract: extractAvinorCharts,
})
