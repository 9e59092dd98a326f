import type { BrowserPage } from '../../browser/session-pool.js'
import {
  createBrowserAutomationAdapter,
  PageStructureError,
} from '../../adapters/browser-automation.js'
import { extractAnacCharts } from './extract.js'

const AD_TAB = "a[href*='#ad']"

export const SEARCH_INPUT_SELECTORS = [
  "input[type='search']",
  "input[placeholder*='Buscar']",
  "input[placeholder*='buscar']",
  '.search-input',
  '#search',
  "input[class*='search']",
] as const

async function findSearchInput(page: BrowserPage): Promise<string> {
  for (const selector of SEARCH_INPUT_SELECTORS) {
    if (await page.isVisible(selector)) return selector
  }
  throw new PageStructureError('No search box on the AD tab')
}

export const anacAdapter = createBrowserAutomationAdapter({
  entryUrl: (baseEndpoint) => `${baseEndpoint}#ad`,
  async run(page, identifier, stepTimeoutMs) {
    await page.click(AD_TAB, { timeout: stepTimeoutMs })
    const input = await findSearchInput(page)
    await page.fill(input, identifier, { timeout: stepTimeoutMs })
    // Results are filtered client-side after a request round trip
    await page.waitForLoadState('networkidle', { timeout: stepTimeoutMs })
  },
  extract: extractAnacCharts,
})
