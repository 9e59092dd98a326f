/**
 * Chart URL resolution.
 *
 * Joins locators against the page they came from, percent-encodes the
 * file name only, and de-duplicates within one resolution call.
 */

export type UrlDropReason = 'INVALID_URL' | 'DUPLICATE_WITHIN_RUN'

export type LocatorResult =
  | { ok: true; url: string }
  | { ok: false; reason: 'INVALID_URL'; details: string }

export type ChartUrlResult =
  | { ok: true; url: string }
  | { ok: false; reason: UrlDropReason; details: string }

const SCHEME = /^[a-z][a-z0-9+.-]*:/i

// An existing escape, or any character outside RFC 3986 pchar
const NEEDS_ENCODING = /%[0-9A-Fa-f]{2}|[^A-Za-z0-9\-._~!$&'()*+,;=:@]/gu

/**
 * Percent-encode a single path segment. Existing `%HH` escapes stay as
 * they are, so encoding twice is a no-op.
 */
export function encodeFileName(segment: string): string {
  return segment.replace(NEEDS_ENCODING, (match) =>
    match.length === 3 && match.startsWith('%') ? match : encodeURIComponent(match)
  )
}

/**
 * Turn a locator into an absolute http(s) URL.
 *
 * @example
 * resolveLocator('chart name v2.pdf', 'https://x.example/ad/airport.html')
 * // { ok: true, url: 'https://x.example/ad/chart%20name%20v2.pdf' }
 */
export function resolveLocator(locator: string, pageUrl: string): LocatorResult {
  const trimmed = locator.trim()
  if (!trimmed) {
    return { ok: false, reason: 'INVALID_URL', details: 'empty locator' }
  }

  let url: URL
  try {
    url = SCHEME.test(trimmed) ? new URL(trimmed) : new URL(trimmed, pageUrl)
  } catch {
    return { ok: false, reason: 'INVALID_URL', details: `unparseable locator: ${trimmed}` }
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { ok: false, reason: 'INVALID_URL', details: `unsupported scheme: ${url.protocol}` }
  }

  // Only the last segment changes; credentials and port stay on the URL
  const path = url.pathname
  const cut = path.lastIndexOf('/') + 1
  url.pathname = path.slice(0, cut) + encodeFileName(path.slice(cut))

  return { ok: true, url: url.href }
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}

/**
 * Decoded file name without extension, used when a chart has no title.
 * `https://x.example/ad/LE_AD_2_LEMD_ADC_en.pdf` -> `LE_AD_2_LEMD_ADC_en`
 */
export function fileNameFromUrl(url: string): string {
  const path = new URL(url).pathname
  const last = path.slice(path.lastIndexOf('/') + 1)
  return safeDecode(last).replace(/\.[A-Za-z0-9]{1,5}$/, '').trim()
}

/**
 * Stateful resolver for one resolution call. The only place duplicates
 * are removed.
 */
export class ChartUrlResolver {
  private readonly emitted = new Set<string>()

  resolve(locator: string, pageUrl: string): ChartUrlResult {
    const resolved = resolveLocator(locator, pageUrl)
    if (!resolved.ok) return resolved

    if (this.emitted.has(resolved.url)) {
      return { ok: false, reason: 'DUPLICATE_WITHIN_RUN', details: resolved.url }
    }
    this.emitted.add(resolved.url)
    return resolved
  }
}
