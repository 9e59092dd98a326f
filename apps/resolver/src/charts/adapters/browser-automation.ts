/**
 * BrowserAutomation adapter: drives a pooled browser session through the
 * steps a person would take, then parses the rendered result.
 *
 * The session is released on every exit path. When the orchestrator's
 * signal aborts, the session is released immediately so pending page
 * operations reject instead of running on.
 */

import type { CheerioAPI } from 'cheerio'
import { loadHtml } from '../kit/html.js'
import type { BrowserPage, BrowserSession } from '../browser/session-pool.js'
import {
  adapterFailure,
  fromExtractResult,
  type AdapterResult,
  type ChartAdapter,
  type ExtractResult,
} from '../types.js'

export interface BrowserScript {
  entryUrl: (baseEndpoint: string) => string
  /** Steps after the entry page loaded: pick the tab, search, wait */
  run: (page: BrowserPage, identifier: string, stepTimeoutMs: number) => Promise<void>
  extract: (input: { $: CheerioAPI; identifier: string; pageUrl: string }) => ExtractResult
  /** Per-step wait budget. Default 15s */
  stepTimeoutMs?: number
}

const DEFAULT_STEP_TIMEOUT_MS = 15_000

/** Thrown by a script when the page lacks a control it needs. */
export class PageStructureError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PageStructureError'
  }
}

function isPlaywrightTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError'
}

function errorSummary(error: unknown): string {
  return error instanceof Error ? error.message.split('\n')[0] : String(error)
}

export function createBrowserAutomationAdapter(script: BrowserScript): ChartAdapter {
  const stepTimeoutMs = script.stepTimeoutMs ?? DEFAULT_STEP_TIMEOUT_MS

  return {
    kind: 'BrowserAutomation',
    async fetch(identifier, descriptor, context): Promise<AdapterResult> {
      const { signal, logger } = context
      if (!context.browserPool) {
        return adapterFailure(
          'UpstreamUnavailable',
          'No browser pool configured for browser-driven sources'
        )
      }

      let acquired: BrowserSession
      try {
        acquired = await context.browserPool.acquire(signal)
      } catch (error) {
        if (signal.aborted) {
          return adapterFailure('BackendTimeout', 'Timed out waiting for a browser session')
        }
        logger.error('Could not start a browser session', { sourceId: descriptor.id }, error)
        return adapterFailure('UpstreamUnavailable', `Browser unavailable: ${errorSummary(error)}`)
      }

      const session = acquired
      const releaseOnAbort = () => {
        session.release().catch((error: unknown) => {
          logger.warn(
            'Browser session release after abort failed',
            { sourceId: descriptor.id },
            error
          )
        })
      }
      signal.addEventListener('abort', releaseOnAbort, { once: true })

      const entryUrl = script.entryUrl(descriptor.baseEndpoint)
      const cancelled = (details: string) => adapterFailure('BackendTimeout', details)
      try {
        if (signal.aborted) return cancelled('Cancelled before the browser session started')

        try {
          await session.page.goto(entryUrl, {
            waitUntil: 'domcontentloaded',
            timeout: stepTimeoutMs,
          })
        } catch (error) {
          if (signal.aborted) return cancelled(`Cancelled while loading ${entryUrl}`)
          return adapterFailure(
            isPlaywrightTimeout(error) ? 'BackendTimeout' : 'UpstreamUnavailable',
            `Could not load ${entryUrl}: ${errorSummary(error)}`
          )
        }

        try {
          await script.run(session.page, identifier, stepTimeoutMs)
        } catch (error) {
          if (signal.aborted) return cancelled(`Cancelled while searching for ${identifier}`)
          // A control that never appears means the layout changed
          const layoutChanged = isPlaywrightTimeout(error) || error instanceof PageStructureError
          return adapterFailure(
            layoutChanged ? 'ParseMismatch' : 'UpstreamUnavailable',
            `Search step failed at ${entryUrl}: ${errorSummary(error)}`
          )
        }

        let html: string
        try {
          html = await session.page.content()
        } catch (error) {
          if (signal.aborted) return cancelled(`Cancelled while reading results for ${identifier}`)
          return adapterFailure(
            'UpstreamUnavailable',
            `Could not read rendered results: ${errorSummary(error)}`
          )
        }

        const extracted = script.extract({ $: loadHtml(html), identifier, pageUrl: entryUrl })
        return fromExtractResult(entryUrl, extracted)
      } finally {
        signal.removeEventListener('abort', releaseOnAbort)
        await session.release()
      }
    },
  }
}
