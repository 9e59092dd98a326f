import type { KnownSourceId } from '@aerochart/chart-sources'
import type { ChartAdapter } from '../types.js'
import { aipnzAdapter } from './aipnz/index.js'
import { anacAdapter } from './anac/index.js'
import { aviationApiAdapter } from './aviationapi/index.js'
import { avinorAdapter } from './avinor/index.js'
import { deceaAdapter } from './decea/index.js'
import { enaireAdapter } from './enaire/index.js'
import { faaAdapter } from './faa/index.js'

/** One adapter per shipped source. Adding a source is a descriptor plus an entry here. */
export const SOURCE_ADAPTERS: Record<KnownSourceId, ChartAdapter> = {
  aipnz: aipnzAdapter,
  anac: anacAdapter,
  aviationapi: aviationApiAdapter,
  avinor: avinorAdapter,
  decea: deceaAdapter,
  enaire: enaireAdapter,
  faa: faaAdapter,
}

function isKnownSourceId(id: string): id is KnownSourceId {
  return Object.hasOwn(SOURCE_ADAPTERS, id)
}

export function getSourceAdapter(sourceId: string): ChartAdapter | undefined {
  return isKnownSourceId(sourceId) ? SOURCE_ADAPTERS[sourceId] : undefined
}
