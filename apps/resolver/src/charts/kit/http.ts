import type { FailureKind } from '../errors.js'
import type { FetchOptions, FetchResult } from '../fetch/http-fetcher.js'
import type { AdapterContext } from '../types.js'

export type PageResult =
  | { ok: true; body: string; finalUrl: string; statusCode?: number }
  | { ok: false; kind: FailureKind; details: string; statusCode?: number }

export interface FetchPageOptions extends Omit<FetchOptions, 'signal'> {
  /** Statuses that mean "this airport is not published here" */
  notFoundStatuses?: readonly number[]
}

const DEFAULT_NOT_FOUND_STATUSES: readonly number[] = [404, 410]

/**
 * Map a transport result to an adapter-level outcome.
 * Timeouts and cancellation both surface as BackendTimeout.
 */
export function mapFetchResult(
  url: string,
  result: FetchResult,
  notFoundStatuses: readonly number[] = DEFAULT_NOT_FOUND_STATUSES
): PageResult {
  const detail = (fallback: string) => `${result.error ?? fallback} (${url})`

  switch (result.status) {
    case 'ok':
      return {
        ok: true,
        body: result.body ?? '',
        finalUrl: result.finalUrl ?? url,
        statusCode: result.statusCode,
      }
    case 'error': {
      const { statusCode } = result
      if (statusCode !== undefined && notFoundStatuses.includes(statusCode)) {
        return { ok: false, kind: 'NotFound', details: detail('not found'), statusCode }
      }
      return { ok: false, kind: 'UpstreamUnavailable', details: detail('HTTP error'), statusCode }
    }
    case 'timeout':
    case 'aborted':
      return { ok: false, kind: 'BackendTimeout', details: detail('timed out') }
    case 'blocked':
    case 'too_large':
    case 'network_error':
      return {
        ok: false,
        kind: 'UpstreamUnavailable',
        details: detail(result.status),
        statusCode: result.statusCode,
      }
  }
}

/** Fetch one page on behalf of an adapter, honouring its cancellation signal. */
export async function fetchPage(
  context: AdapterContext,
  url: string,
  options: FetchPageOptions = {}
): Promise<PageResult> {
  const { notFoundStatuses, ...fetchOptions } = options
  context.logger.debug('Fetching page', { url, method: fetchOptions.method ?? 'GET' })
  const result = await context.fetcher.fetch(url, { ...fetchOptions, signal: context.signal })
  context.logger.debug('Fetched page', {
    url,
    status: result.status,
    durationMs: result.durationMs,
  })
  return mapFetchResult(url, result, notFoundStatuses)
}
