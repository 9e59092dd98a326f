/**
 * Publication-cycle (AIRAC folder) discovery.
 *
 * Candidate tags are parsed into calendar dates and the latest wins.
 * Raw strings are never compared: "2025-2-1" sorts before "2025-11-1".
 */

import type { FailureKind } from './errors.js'
import { fetchPage } from './kit/http.js'
import type { AdapterContext } from './types.js'

export interface VersionPointer {
  /** Tag as published, e.g. "2025-11-27-AIRAC" */
  tag: string
  effectiveDate: Date
}

export type VersionResult =
  | { ok: true; version: VersionPointer }
  | { ok: false; kind: FailureKind; details: string }

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
}

// 2025-11-27, 2025-2-1, 2026_01_22
const YEAR_FIRST = /(?<!\d)(\d{4})[-_.](\d{1,2})[-_.](\d{1,2})(?!\d)/
// 27NOV2025, 25Dec_2025, 1-Feb-2026
const DAY_FIRST = /(?<!\d)(\d{1,2})[ _-]?([A-Za-z]{3})[A-Za-z]*[ _-]?(\d{4})(?!\d)/
// 20251127
const COMPACT = /(?<!\d)(\d{4})(\d{2})(\d{2})(?!\d)/

function utcDate(year: number, month: number, day: number): Date | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31) return undefined
  const date = new Date(Date.UTC(year, month - 1, day))
  // Reject 2025-02-30 and friends instead of rolling over
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return undefined
  return date
}

/**
 * Parse the effective date out of a publication tag.
 * Returns undefined when the tag carries no recognisable date.
 */
export function parseVersionTag(tag: string): Date | undefined {
  const yearFirst = YEAR_FIRST.exec(tag)
  if (yearFirst) {
    return utcDate(Number(yearFirst[1]), Number(yearFirst[2]), Number(yearFirst[3]))
  }

  const dayFirst = DAY_FIRST.exec(tag)
  if (dayFirst) {
    const month = MONTHS[dayFirst[2].toLowerCase()]
    if (month !== undefined) {
      return utcDate(Number(dayFirst[3]), month, Number(dayFirst[1]))
    }
  }

  const compact = COMPACT.exec(tag)
  if (compact) {
    return utcDate(Number(compact[1]), Number(compact[2]), Number(compact[3]))
  }

  return undefined
}

export interface SelectVersionOptions {
  /** Ignore editions that take effect after this instant (pending amendments) */
  notAfter?: Date
}

/**
 * Pick the latest candidate by calendar date. Ties keep the first seen.
 *
 * @example
 * selectLatestVersion(['2025-03-01-AIRAC', '2025-11-27-AIRAC', '2025-06-10-AIRAC'])?.tag
 * // '2025-11-27-AIRAC'
 */
export function selectLatestVersion(
  candidates: readonly string[],
  options: SelectVersionOptions = {}
): VersionPointer | undefined {
  let best: VersionPointer | undefined

  for (const tag of candidates) {
    const effectiveDate = parseVersionTag(tag)
    if (!effectiveDate) continue
    if (options.notAfter && effectiveDate.getTime() > options.notAfter.getTime()) continue
    if (!best || effectiveDate.getTime() > best.effectiveDate.getTime()) {
      best = { tag, effectiveDate }
    }
  }

  return best
}

export interface VersionDiscovery {
  /** Page listing the publication folders */
  indexUrl: (baseEndpoint: string) => string
  /** Candidate tags found on the index page */
  extractCandidates: (body: string, indexUrl: string) => string[]
  /** Skip editions not yet in force */
  skipPending?: boolean
}

/**
 * Resolve the current publication folder. Runs on every request.
 * No parseable candidate is VersionUnresolved; a failed index fetch keeps
 * its transport kind.
 */
export async function discoverVersion(
  context: AdapterContext,
  baseEndpoint: string,
  discovery: VersionDiscovery
): Promise<VersionResult> {
  const indexUrl = discovery.indexUrl(baseEndpoint)
  const page = await fetchPage(context, indexUrl)
  if (!page.ok) {
    // A missing index means the cycle cannot be determined, not that the airport is unknown
    const kind: FailureKind = page.kind === 'NotFound' ? 'VersionUnresolved' : page.kind
    return { ok: false, kind, details: page.details }
  }

  const candidates = discovery.extractCandidates(page.body, page.finalUrl)
  const version = selectLatestVersion(candidates, {
    notAfter: discovery.skipPending ? context.now() : undefined,
  })

  if (!version) {
    return {
      ok: false,
      kind: 'VersionUnresolved',
      details: `No publication folder found among ${candidates.length} candidates at ${indexUrl}`,
    }
  }

  context.logger.debug('Resolved publication folder', {
    tag: version.tag,
    effectiveDate: version.effectiveDate.toISOString().slice(0, 10),
  })
  return { ok: true, version }
}
