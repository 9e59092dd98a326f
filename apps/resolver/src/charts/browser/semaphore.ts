export class AcquireAbortedError extends Error {
  constructor() {
    super('Gave up waiting for a free slot')
    this.name = 'AcquireAbortedError'
  }
}

/**
 * Counting semaphore. `acquire` resolves to a release function that is
 * safe to call more than once.
 */
export class Semaphore {
  private readonly waiters: Array<() => void> = []
  private available: number

  constructor(capacity: number) {
    this.available = Math.max(1, Math.floor(capacity))
  }

  get free(): number {
    return this.available
  }

  get waiting(): number {
    return this.waiters.length
  }

  async acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      throw new AcquireAbortedError()
    }

    if (this.available > 0) {
      this.available -= 1
      return this.releaser()
    }

    return new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(notify)
        reject(new AcquireAbortedError())
      }

      const notify = () => {
        signal?.removeEventListener('abort', onAbort)
        this.available -= 1
        resolve(this.releaser())
      }

      signal?.addEventListener('abort', onAbort, { once: true })
      this.waiters.push(notify)
    })
  }

  private releaser(): () => void {
    let released = false
    return () => {
      if (released) return
      released = true
      this.release()
    }
  }

  private removeWaiter(waiter: () => void): void {
    const idx = this.waiters.indexOf(waiter)
    if (idx >= 0) {
      this.waiters.splice(idx, 1)
    }
  }

  private release(): void {
    this.available += 1
    const next = this.waiters.shift()
    if (next) {
      next()
    }
  }
}
