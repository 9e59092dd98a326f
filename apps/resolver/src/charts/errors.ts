/**
 * Failure taxonomy for chart resolution.
 *
 * Adapters report the most specific kind they can determine; the
 * orchestrator passes it through unchanged.
 */

export const FAILURE_KINDS = [
  'UnknownSource',
  'VersionUnresolved',
  'NotFound',
  'UpstreamUnavailable',
  'ParseMismatch',
  'BackendTimeout',
] as const

export type FailureKind = (typeof FAILURE_KINDS)[number]

export interface ChartResolutionFailure {
  kind: FailureKind
  identifier: string
  /** Absent when no source matched */
  sourceId?: string
  details: string
}

interface KindTraits {
  retryable: boolean
  httpStatus: number
  /** User-facing summary; never shared between the three caller-visible classes */
  summary: string
}

const KIND_TRAITS: Record<FailureKind, KindTraits> = {
  UnknownSource: {
    retryable: false,
    httpStatus: 400,
    summary: 'Unknown airport: no chart source covers this identifier',
  },
  VersionUnresolved: {
    retryable: true,
    httpStatus: 503,
    summary: 'The source is between publication cycles; try again later',
  },
  NotFound: {
    retryable: false,
    httpStatus: 404,
    summary: 'Airport not found at its chart source',
  },
  UpstreamUnavailable: {
    retryable: true,
    httpStatus: 502,
    summary: 'Could not reach the chart source',
  },
  ParseMismatch: {
    retryable: false,
    httpStatus: 502,
    summary: 'The chart source changed its layout; charts could not be read',
  },
  BackendTimeout: {
    retryable: true,
    httpStatus: 504,
    summary: 'The chart source did not answer in time',
  },
}

export function isFailureKind(value: string): value is FailureKind {
  return (FAILURE_KINDS as readonly string[]).includes(value)
}

/** Whether a caller may retry later without a code change */
export function isRetryable(kind: FailureKind): boolean {
  return KIND_TRAITS[kind].retryable
}

export function httpStatusFor(kind: FailureKind): number {
  return KIND_TRAITS[kind].httpStatus
}

/**
 * One-line message for a failure, e.g.
 * `Could not reach the chart source (decea, SBGR): HTTP 500`
 */
export function describeFailure(failure: ChartResolutionFailure): string {
  const where = failure.sourceId ? `${failure.sourceId}, ${failure.identifier}` : failure.identifier
  return `${KIND_TRAITS[failure.kind].summary} (${where}): ${failure.details}`
}

/**
 * Thrown form of a resolution failure, for callers that unwind
 * (the HTTP error middleware, the CLI's top-level handler).
 */
export class ChartResolutionError extends Error {
  readonly failure: ChartResolutionFailure

  constructor(failure: ChartResolutionFailure) {
    super(describeFailure(failure))
    this.name = 'ChartResolutionError'
    this.failure = failure
  }

  get kind(): FailureKind {
    return this.failure.kind
  }

  get retryable(): boolean {
    return isRetryable(this.failure.kind)
  }

  get statusCode(): number {
    return httpStatusFor(this.failure.kind)
  }
}
