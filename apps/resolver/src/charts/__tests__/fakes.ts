import { readFileSync } from 'node:fs'
import { CHART_SOURCES, type SourceDescriptor } from '@aerochart/chart-sources'
import { silentLogger } from '@aerochart/logger'
import type {
  BrowserPage,
  BrowserSession,
  BrowserSessionPool,
  LoadState,
} from '../browser/session-pool.js'
import type { FetchOptions, FetchResult, PageFetcher } from '../fetch/http-fetcher.js'
import type { AdapterContext } from '../types.js'

export type FakeRoute = FetchResult | ((options: FetchOptions | undefined) => Promise<FetchResult>)

/** Serves canned results by exact URL; anything else is a 404. */
export class FakeFetcher implements PageFetcher {
  readonly calls: Array<{ url: string; options?: FetchOptions }> = []
  private readonly routes: Map<string, FakeRoute>

  constructor(routes: Record<string, FakeRoute> = {}) {
    this.routes = new Map(Object.entries(routes))
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    this.calls.push({ url, options })
    const route = this.routes.get(url)
    if (!route) {
      return {
        status: 'error',
        statusCode: 404,
        finalUrl: url,
        durationMs: 1,
        error: 'HTTP 404: Not Found',
      }
    }
    return typeof route === 'function' ? route(options) : route
  }
}

export function okPage(body: string, finalUrl?: string): FetchResult {
  return { status: 'ok', statusCode: 200, body, finalUrl, durationMs: 1 }
}

/** A fetch that only settles when its signal aborts. */
export function hangingRoute(): FakeRoute {
  return (options) =>
    new Promise<FetchResult>((resolve) => {
      const abort = () => resolve({ status: 'aborted', durationMs: 0 })
      options?.signal?.addEventListener('abort', abort, { once: true })
    })
}

export const TEST_NOW = new Date('2026-01-15T12:00:00Z')

export function adapterContext(overrides: Partial<AdapterContext> = {}): AdapterContext {
  return {
    fetcher: new FakeFetcher(),
    signal: new AbortController().signal,
    logger: silentLogger,
    now: () => TEST_NOW,
    ...overrides,
  }
}

/** Read a fixture relative to the calling test file. */
export function readFixture(testFileUrl: string, relativePath: string): string {
  return readFileSync(new URL(relativePath, testFileUrl), 'utf8')
}

export function knownDescriptor(id: string): SourceDescriptor {
  const found = CHART_SOURCES.find((source) => source.id === id)
  if (!found) throw new Error(`No shipped source ${id}`)
  return found
}

// ═══════════════════════════════════════════════════════════════════════════════
// Browser
// ═══════════════════════════════════════════════════════════════════════════════

export interface FakePageScript {
  /** Rendered HTML returned by content() */
  html?: string
  /** Selectors isVisible() reports as visible */
  visible?: readonly string[]
  /** Make one step fail; keyed by method name */
  fail?: Partial<Record<'goto' | 'click' | 'fill' | 'waitForLoadState' | 'content', Error>>
  /** goto never settles */
  hangOnGoto?: boolean
}

/** Records every step; behaviour comes from the script. */
export class FakeBrowserPage implements BrowserPage {
  readonly steps: string[] = []

  constructor(private readonly script: FakePageScript = {}) {}

  async goto(url: string): Promise<void> {
    this.steps.push(`goto ${url}`)
    if (this.script.hangOnGoto) return new Promise<void>(() => {})
    this.maybeFail('goto')
  }

  async click(selector: string): Promise<void> {
    this.steps.push(`click ${selector}`)
    this.maybeFail('click')
  }

  async fill(selector: string, value: string): Promise<void> {
    this.steps.push(`fill ${selector} ${value}`)
    this.maybeFail('fill')
  }

  async waitForSelector(selector: string): Promise<void> {
    this.steps.push(`waitForSelector ${selector}`)
  }

  async waitForLoadState(state?: LoadState): Promise<void> {
    this.steps.push(`waitForLoadState ${state ?? 'load'}`)
    this.maybeFail('waitForLoadState')
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.script.visible?.includes(selector) ?? false
  }

  async content(): Promise<string> {
    this.maybeFail('content')
    return this.script.html ?? '<html><body></body></html>'
  }

  private maybeFail(step: keyof NonNullable<FakePageScript['fail']>): void {
    const error = this.script.fail?.[step]
    if (error) throw error
  }
}

export function timeoutError(message: string): Error {
  const error = new Error(message)
  error.name = 'TimeoutError'
  return error
}

/** Hands out one scripted page per acquire and counts releases. */
export class FakeBrowserPool implements BrowserSessionPool {
  acquired = 0
  released = 0
  readonly pages: FakeBrowserPage[] = []

  constructor(
    private readonly script: FakePageScript = {},
    private readonly acquireError?: Error
  ) {}

  async acquire(): Promise<BrowserSession> {
    if (this.acquireError) throw this.acquireError
    this.acquired += 1
    const page = new FakeBrowserPage(this.script)
    this.pages.push(page)
    let done = false
    return {
      page,
      release: async () => {
        if (done) return
        done = true
        this.released += 1
      },
    }
  }

  async close(): Promise<void> {}
}
