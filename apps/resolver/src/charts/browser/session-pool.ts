/**
 * Bounded pool of isolated browser sessions.
 *
 * One shared Chromium process, one fresh browser context per session.
 * A session holds a pool slot until `release()`, which is idempotent.
 * The process is launched lazily and again after it disconnects.
 */

import { chromium, type Browser, type Page } from 'playwright-core'
import type { ILogger } from '@aerochart/logger'
import { Semaphore } from './semaphore.js'

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle'

/** The page operations adapters are allowed to use. */
export interface BrowserPage {
  goto(url: string, options?: { timeout?: number; waitUntil?: LoadState }): Promise<void>
  click(selector: string, options?: { timeout?: number }): Promise<void>
  fill(selector: string, value: string, options?: { timeout?: number }): Promise<void>
  waitForSelector(
    selector: string,
    options?: { timeout?: number; state?: 'attached' | 'visible' }
  ): Promise<void>
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>
  isVisible(selector: string): Promise<boolean>
  content(): Promise<string>
}

export interface BrowserSession {
  readonly page: BrowserPage
  release(): Promise<void>
}

export interface BrowserSessionPool {
  /** Rejects when the signal aborts before a slot frees up */
  acquire(signal?: AbortSignal): Promise<BrowserSession>
  close(): Promise<void>
}

export interface PlaywrightPoolOptions {
  size: number
  executablePath?: string
  channel?: string
  userAgent?: string
  logger: ILogger
}

function wrapPage(page: Page): BrowserPage {
  return {
    goto: async (url, options) => {
      await page.goto(url, options)
    },
    click: (selector, options) => page.click(selector, options),
    fill: (selector, value, options) => page.fill(selector, value, options),
    waitForSelector: async (selector, options) => {
      await page.waitForSelector(selector, options)
    },
    waitForLoadState: (state, options) => page.waitForLoadState(state, options),
    isVisible: (selector) => page.isVisible(selector),
    content: () => page.content(),
  }
}

export class PlaywrightSessionPool implements BrowserSessionPool {
  private readonly slots: Semaphore
  private browser?: Promise<Browser>
  private closed = false

  constructor(private readonly options: PlaywrightPoolOptions) {
    this.slots = new Semaphore(options.size)
  }

  async acquire(signal?: AbortSignal): Promise<BrowserSession> {
    if (this.closed) {
      throw new Error('Browser pool is closed')
    }

    const releaseSlot = await this.slots.acquire(signal)
    try {
      const browser = await this.launch()
      const context = await browser.newContext({ userAgent: this.options.userAgent })
      const page = await context.newPage()
      const log = this.options.logger

      let released = false
      return {
        page: wrapPage(page),
        release: async () => {
          if (released) return
          released = true
          try {
            await context.close()
          } catch (error) {
            log.warn('Browser context did not close cleanly', {}, error)
          } finally {
            releaseSlot()
          }
        },
      }
    } catch (error) {
      releaseSlot()
      throw error
    }
  }

  async close(): Promise<void> {
    this.closed = true
    if (!this.browser) return
    const browser = await this.browser
    this.browser = undefined
    await browser.close()
  }

  private launch(): Promise<Browser> {
    if (!this.browser) {
      const log = this.options.logger
      log.info('Launching browser', {
        channel: this.options.channel ?? 'default',
        poolSize: this.options.size,
      })
      const pending: Promise<Browser> = chromium
        .launch({
          headless: true,
          executablePath: this.options.executablePath,
          channel: this.options.channel,
        })
        .then(
          (browser) => {
            // A crashed browser is relaunched by the next acquire
            browser.on('disconnected', () => {
              if (this.browser !== pending) return
              this.browser = undefined
              log.warn('Browser disconnected')
            })
            return browser
          },
          (error: unknown) => {
            this.browser = undefined
            throw error
          }
        )
      this.browser = pending
    }
    return this.browser
  }
}
