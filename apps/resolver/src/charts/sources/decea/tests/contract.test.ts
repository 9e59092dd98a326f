import { describe, expect, it } from 'vitest'
import {
  adapterContext,
  FakeFetcher,
  knownDescriptor,
  okPage,
  readFixture,
} from '../../../__tests__/fakes.js'
import { buildChartRecords } from '../../../resolver.js'
import { deceaAdapter } from '../index.js'

const BASE = 'https://aisweb.decea.mil.br/'

async function fetchFixture(identifier: string, fixture: string) {
  const url = `${BASE}?i=aerodromos&codigo=${identifier}`
  const page = readFixture(import.meta.url, `../fixtures/${fixture}`)
  const fetcher = new FakeFetcher({ [url]: okPage(page) })
  return deceaAdapter.fetch(identifier, knownDescriptor('decea'), adapterContext({ fetcher }))
}

describe('decea contract', () => {
  it('prefixes titles with their section and keeps only download links', async () => {
    const result = await fetchFixture('SBXX', 'sbxx.html')
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.rawCharts.map((c) => c.title)).toEqual([
      'ADC - ADC SBXX',
      'IAC - ILS Z RWY 09R',
      'IAC - RNP Y RWY 27L',
      'SID - RNAV PULUV 1A RWY 09R',
      'STAR - RNAV ESLOP 1A',
    ])
  })

  it('categorizes by section even when titles suggest otherwise', async () => {
    const result = await fetchFixture('SBXX', 'sbxx.html')
    if (!result.ok) throw new Error('fixture should extract')

    const records = buildChartRecords(result.pageUrl, result.rawCharts)
    expect(records.map((r) => r.category)).toEqual([
      'Ground',
      'Approach',
      'Approach',
      'DepartureProcedure',
      'ArrivalProcedure',
    ])
    expect(records[0].url).toBe(
      'https://aisweb.decea.mil.br/download/?arquivo=aaaa1111-adc&apikey=test-key'
    )
  })

  it('reports an unknown aerodrome as not found', async () => {
    const result = await fetchFixture('SBQQ', 'unknown.html')
    expect(result).toEqual({ ok: false, kind: 'NotFound', details: 'AISWEB has no aerodrome SBQQ' })
  })

  it('keeps transport failures as upstream errors', async () => {
    const fetcher = new FakeFetcher({
      [`${BASE}?i=aerodromos&codigo=SBXX`]: {
        status: 'error',
        statusCode: 500,
        durationMs: 3,
        error: 'HTTP 500: Server Error',
      },
    })
    const result = await deceaAdapter.fetch(
      'SBXX',
      knownDescriptor('decea'),
      adapterContext({ fetcher })
    )
    expect(result).toEqual({
      ok: false,
      kind: 'UpstreamUnavailable',
      details: `HTTP 500: Server Error (${BASE}?i=aerodromos&codigo=SBXX)`,
    })
  })
})
