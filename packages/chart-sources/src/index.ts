/**
 * Chart source descriptors shared across apps.
 *
 * Loaded once at process start and never mutated. Prefixes are ICAO
 * location-indicator prefixes; the registry matches the longest one first.
 */

export const ADAPTER_KINDS = [
  'StaticHTML',
  'FragmentFiltered',
  'JSONApi',
  'BrowserAutomation',
  'OfflineDatabase',
] as const

export type AdapterKind = (typeof ADAPTER_KINDS)[number]

export const TIMEOUT_CLASSES = ['fast', 'moderate', 'slow'] as const

export type TimeoutClass = (typeof TIMEOUT_CLASSES)[number]

export interface SourceDescriptor {
  id: string
  /** Publishing authority, e.g. "DECEA (Brazil)" */
  name: string
  identifierPrefixes: readonly string[]
  adapterKind: AdapterKind
  baseEndpoint: string
  timeoutClass: TimeoutClass
  /** True only for OfflineDatabase sources */
  isOffline: boolean
}

export const KNOWN_SOURCES = [
  {
    id: 'aipnz',
    name: 'AIP New Zealand',
    identifierPrefixes: ['NZ'],
    adapterKind: 'OfflineDatabase',
    baseEndpoint: 'https://www.aip.net.nz/',
    timeoutClass: 'fast',
    isOffline: true,
  },
  {
    id: 'anac',
    name: 'ANAC (Argentina)',
    identifierPrefixes: ['SA', 'SE', 'SG', 'SL', 'SO', 'SY'],
    adapterKind: 'BrowserAutomation',
    baseEndpoint: 'https://ais.anac.gob.ar/aip',
    timeoutClass: 'slow',
    isOffline: false,
  },
  {
    id: 'aviationapi',
    name: 'FAA d-TPP via AviationAPI (Alaska, Hawaii, Pacific)',
    identifierPrefixes: ['PA', 'PF', 'PG', 'PH'],
    adapterKind: 'JSONApi',
    baseEndpoint: 'https://api.aviationapi.com/v1/',
    timeoutClass: 'fast',
    isOffline: false,
  },
  {
    id: 'avinor',
    name: 'Avinor (Norway)',
    identifierPrefixes: ['EN'],
    adapterKind: 'StaticHTML',
    baseEndpoint: 'https://aim-prod.avinor.no/no/AIP/View/Index/148/',
    timeoutClass: 'moderate',
    isOffline: false,
  },
  {
    id: 'decea',
    name: 'DECEA (Brazil)',
    identifierPrefixes: ['SB', 'SD', 'SI', 'SJ', 'SN', 'SS', 'SW'],
    adapterKind: 'StaticHTML',
    baseEndpoint: 'https://aisweb.decea.mil.br/',
    timeoutClass: 'moderate',
    isOffline: false,
  },
  {
    id: 'enaire',
    name: 'ENAIRE (Spain)',
    identifierPrefixes: ['LE', 'GC'],
    adapterKind: 'FragmentFiltered',
    baseEndpoint: 'https://aip.enaire.es/aip/',
    timeoutClass: 'moderate',
    isOffline: false,
  },
  {
    id: 'faa',
    name: 'FAA (United States)',
    identifierPrefixes: ['K'],
    adapterKind: 'StaticHTML',
    baseEndpoint: 'https://nfdc.faa.gov/nfdcApps/services/ajv5/',
    timeoutClass: 'fast',
    isOffline: false,
  },
] as const satisfies readonly SourceDescriptor[]

export type KnownSource = (typeof KNOWN_SOURCES)[number]
export type KnownSourceId = KnownSource['id']

const PREFIX_PATTERN = /^[A-Z0-9]+$/

/**
 * Check a descriptor table and return a frozen copy.
 * Throws on configuration errors; these are never resolution failures.
 */
export function defineSources(entries: readonly SourceDescriptor[]): readonly SourceDescriptor[] {
  const ids = new Set<string>()
  const owners = new Map<string, string>()

  for (const entry of entries) {
    if (ids.has(entry.id)) {
      throw new Error(`Duplicate chart source id: ${entry.id}`)
    }
    ids.add(entry.id)

    if (entry.identifierPrefixes.length === 0) {
      throw new Error(`Chart source ${entry.id} owns no identifier prefixes`)
    }
    if (entry.isOffline !== (entry.adapterKind === 'OfflineDatabase')) {
      throw new Error(`Chart source ${entry.id}: isOffline must match the OfflineDatabase kind`)
    }
    if (entry.adapterKind === 'BrowserAutomation' && entry.timeoutClass !== 'slow') {
      throw new Error(`Chart source ${entry.id}: browser automation needs the slow timeout class`)
    }

    for (const prefix of entry.identifierPrefixes) {
      if (!PREFIX_PATTERN.test(prefix)) {
        throw new Error(`Chart source ${entry.id}: invalid prefix "${prefix}"`)
      }
      const owner = owners.get(prefix)
      if (owner) {
        throw new Error(`Prefix ${prefix} is claimed by both ${owner} and ${entry.id}`)
      }
      owners.set(prefix, entry.id)
    }
  }

  return Object.freeze(
    entries.map((entry) =>
      Object.freeze({ ...entry, identifierPrefixes: Object.freeze([...entry.identifierPrefixes]) })
    )
  )
}

/** The process-wide descriptor table. */
export const CHART_SOURCES: readonly SourceDescriptor[] = defineSources(KNOWN_SOURCES)
