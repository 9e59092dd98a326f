/**
 * HTTP page fetcher.
 *
 * Native fetch with a hard timeout, a body size limit, blocked-page
 * detection and caller cancellation. One attempt per call: retry policy
 * belongs to whoever calls the resolver.
 */

export type FetchStatus =
  | 'ok'
  | 'error' // non-2xx status
  | 'blocked' // captcha / access denied page
  | 'timeout'
  | 'aborted' // caller signal fired
  | 'too_large'
  | 'network_error'

export interface FetchOptions {
  method?: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: string
  timeoutMs?: number
  maxSizeBytes?: number
  signal?: AbortSignal
}

export interface FetchResult {
  status: FetchStatus
  statusCode?: number
  body?: string
  /** URL after redirects; relative links resolve against it */
  finalUrl?: string
  contentType?: string
  durationMs: number
  error?: string
}

export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export const DEFAULT_FETCH_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': 'AeroChart/0.1 (+chart resolver)',
  Accept: 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.8,es;q=0.6,pt;q=0.5,fr;q=0.5',
}

export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'bot detection',
  'rate limit',
]

export interface HttpFetcherOptions {
  userAgent?: string
  defaultTimeoutMs?: number
  maxSizeBytes?: number
}

export class HttpFetcher implements PageFetcher {
  private readonly headers: Record<string, string>
  private readonly defaultTimeoutMs: number
  private readonly maxSizeBytes: number

  constructor(options: HttpFetcherOptions = {}) {
    this.headers = { ...DEFAULT_FETCH_HEADERS }
    if (options.userAgent) this.headers['User-Agent'] = options.userAgent
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const elapsed = () => Date.now() - startTime
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs
    const maxBytes = options.maxSizeBytes ?? this.maxSizeBytes

    if (options.signal?.aborted) {
      return { status: 'aborted', durationMs: 0, error: 'Request cancelled before start' }
    }

    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onCallerAbort = () => controller.abort()
    options.signal?.addEventListener('abort', onCallerAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: options.method ?? 'GET',
        headers: { ...this.headers, ...options.headers },
        body: options.body,
        signal: controller.signal,
        redirect: 'follow',
      })
      const finalUrl = response.url || url
      const contentType = response.headers.get('content-type') ?? undefined

      if (response.status === 403 || response.status === 503 || response.status === 429) {
        const text = await response.text()
        if (looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            finalUrl,
            durationMs: elapsed(),
            error: 'Request blocked (captcha or access denied)',
          }
        }
        return {
          status: 'error',
          statusCode: response.status,
          finalUrl,
          durationMs: elapsed(),
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          finalUrl,
          durationMs: elapsed(),
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > maxBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          finalUrl,
          durationMs: elapsed(),
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await readBodyWithLimit(response, maxBytes)
      if (body === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          finalUrl,
          durationMs: elapsed(),
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        body,
        finalUrl,
        contentType,
        durationMs: elapsed(),
      }
    } catch (error) {
      if (controller.signal.aborted) {
        const message = timedOut ? `Request timed out after ${timeoutMs}ms` : 'Request cancelled'
        return { status: timedOut ? 'timeout' : 'aborted', durationMs: elapsed(), error: message }
      }
      return {
        status: 'network_error',
        durationMs: elapsed(),
        error: error instanceof Error ? describeNetworkError(error) : String(error),
      }
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', onCallerAbort)
    }
  }
}

function describeNetworkError(error: Error): string {
  // undici wraps the socket error in `cause`
  const cause = error.cause
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`
  }
  return error.message
}

async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
  const reader = response.body?.getReader()
  if (!reader) {
    return ''
  }

  const chunks: Uint8Array[] = []
  let totalSize = 0
  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      totalSize += value.length
      if (totalSize > maxBytes) {
        await reader.cancel()
        return null
      }
      chunks.push(value)
    }
    return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
  } finally {
    reader.releaseLock()
  }
}

export function looksLikeBlockedPage(html: string): boolean {
  const lower = html.toLowerCase()
  return BLOCK_INDICATORS.some((indicator) => lower.includes(indicator))
}
