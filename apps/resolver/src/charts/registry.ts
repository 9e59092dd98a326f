/**
 * Source Registry: routes an identifier to the source that owns its
 * longest matching prefix.
 */

import { CHART_SOURCES, defineSources, type SourceDescriptor } from '@aerochart/chart-sources'
import type { ChartResolutionFailure } from './errors.js'

export type RegistryLookup =
  | { ok: true; descriptor: SourceDescriptor; prefix: string }
  | { ok: false; failure: ChartResolutionFailure }

export interface PrefixRoute {
  prefix: string
  sourceId: string
}

export interface SourceSummary {
  id: string
  name: string
  adapterKind: SourceDescriptor['adapterKind']
  timeoutClass: SourceDescriptor['timeoutClass']
  isOffline: boolean
  identifierPrefixes: readonly string[]
}

export function normalizeIdentifier(identifier: string): string {
  return identifier.trim().toUpperCase()
}

export class SourceRegistry {
  private readonly byPrefix = new Map<string, SourceDescriptor>()
  private readonly byId = new Map<string, SourceDescriptor>()
  /** Distinct prefix lengths, longest first */
  private readonly lengths: number[]

  constructor(descriptors: readonly SourceDescriptor[]) {
    for (const descriptor of defineSources(descriptors)) {
      this.byId.set(descriptor.id, descriptor)
      for (const prefix of descriptor.identifierPrefixes) {
        this.byPrefix.set(prefix, descriptor)
      }
    }
    const lengths = new Set([...this.byPrefix.keys()].map((p) => p.length))
    this.lengths = [...lengths].sort((a, b) => b - a)
  }

  /**
   * Descriptor owning the identifier. A 3-character override such as
   * `TFF` wins over a 2-character `TF`.
   */
  resolve(identifier: string): RegistryLookup {
    const normalized = normalizeIdentifier(identifier)

    for (const length of this.lengths) {
      if (normalized.length < length) continue
      const prefix = normalized.slice(0, length)
      const descriptor = this.byPrefix.get(prefix)
      if (descriptor) {
        return { ok: true, descriptor, prefix }
      }
    }

    return {
      ok: false,
      failure: {
        kind: 'UnknownSource',
        identifier: normalized,
        details: normalized
          ? `No chart source is configured for prefix of ${normalized}`
          : 'Empty identifier',
      },
    }
  }

  get(sourceId: string): SourceDescriptor | undefined {
    return this.byId.get(sourceId)
  }

  /** Every prefix with its owner, longest first, then alphabetical. */
  listPrefixes(): PrefixRoute[] {
    return [...this.byPrefix.entries()]
      .map(([prefix, descriptor]) => ({ prefix, sourceId: descriptor.id }))
      .sort((a, b) => b.prefix.length - a.prefix.length || a.prefix.localeCompare(b.prefix))
  }

  listSources(): SourceSummary[] {
    return [...this.byId.values()]
      .map((d) => ({
        id: d.id,
        name: d.name,
        adapterKind: d.adapterKind,
        timeoutClass: d.timeoutClass,
        isOffline: d.isOffline,
        identifierPrefixes: d.identifierPrefixes,
      }))
      .sort((a, b) => a.id.localeCompare(b.id))
  }
}

let registry: SourceRegistry | null = null

/** Process-wide registry over the shipped descriptor table. */
export function getSourceRegistry(): SourceRegistry {
  if (!registry) {
    registry = new SourceRegistry(CHART_SOURCES)
  }
  return registry
}
