import { silentLogger } from '@aerochart/logger'
import { beforeEach, describe, expect, it, vi } from 'vitest'

const { launchMock, contextClose, browserClose, browsers } = vi.hoisted(() => {
  const contextClose = vi.fn(async () => undefined)
  const browserClose = vi.fn(async () => undefined)
  const page = {
    goto: vi.fn(async () => null),
    click: vi.fn(async () => undefined),
    fill: vi.fn(async () => undefined),
    waitForSelector: vi.fn(async () => null),
    waitForLoadState: vi.fn(async () => undefined),
    isVisible: vi.fn(async () => true),
    content: vi.fn(async () => '<html></html>'),
  }
  const browsers: Array<{ disconnect: () => void }> = []
  const launchMock = vi.fn(async () => {
    const onDisconnect: Array<() => void> = []
    browsers.push({ disconnect: () => onDisconnect.forEach((handler) => handler()) })
    return {
      newContext: async () => ({ newPage: async () => page, close: contextClose }),
      close: browserClose,
      on: (event: string, handler: () => void) => {
        if (event === 'disconnected') onDisconnect.push(handler)
      },
    }
  })
  return { launchMock, contextClose, browserClose, browsers }
})

vi.mock('playwright-core', () => ({ chromium: { launch: launchMock } }))

import { PlaywrightSessionPool } from '../browser/session-pool.js'

describe('PlaywrightSessionPool', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    browsers.length = 0
  })

  it('launches one browser and isolates each session in its own context', async () => {
    const pool = new PlaywrightSessionPool({ size: 2, logger: silentLogger })
    const first = await pool.acquire()
    const second = await pool.acquire()

    expect(launchMock).toHaveBeenCalledTimes(1)
    expect(await first.page.content()).toBe('<html></html>')

    await first.release()
    await first.release()
    expect(contextClose).toHaveBeenCalledTimes(1)

    await second.release()
    await pool.close()
    expect(browserClose).toHaveBeenCalledTimes(1)
  })

  it('frees the slot on release so waiters proceed', async () => {
    const pool = new PlaywrightSessionPool({ size: 1, logger: silentLogger })
    const first = await pool.acquire()
    const waiting = pool.acquire()
    await first.release()
    const second = await waiting
    await second.release()
    await pool.close()
  })

  it('gives up the slot when the launch fails', async () => {
    launchMock.mockRejectedValueOnce(new Error('Executable does not exist'))
    const pool = new PlaywrightSessionPool({
      size: 1,
      logger: silentLogger,
      executablePath: '/missing/chrome',
    })

    await expect(pool.acquire()).rejects.toThrow('Executable does not exist')
    const session = await pool.acquire()
    expect(launchMock).toHaveBeenCalledTimes(2)
    await session.release()
    await pool.close()
  })

  it('relaunches the browser after it disconnects', async () => {
    const pool = new PlaywrightSessionPool({ size: 1, logger: silentLogger })
    const first = await pool.acquire()
    await first.release()
    expect(browsers).toHaveLength(1)

    browsers[0]?.disconnect()
    const second = await pool.acquire()
    expect(launchMock).toHaveBeenCalledTimes(2)
    await second.release()
    await pool.close()
  })

  it('refuses new sessions once closed', async () => {
    const pool = new PlaywrightSessionPool({ size: 1, logger: silentLogger })
    await pool.close()
    await expect(pool.acquire()).rejects.toThrow('Browser pool is closed')
  })
})
