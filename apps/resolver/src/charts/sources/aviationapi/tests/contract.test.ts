import { describe, expect, it } from 'vitest'
import {
  adapterContext,
  FakeFetcher,
  knownDescriptor,
  okPage,
  readFixture,
} from '../../../__tests__/fakes.js'
import { buildChartRecords } from '../../../resolver.js'
import { aviationApiAdapter } from '../index.js'

const REQUEST = 'https://api.aviationapi.com/v1/charts?apt=PAXX'
const TPP = 'https://charts.example.test/d-tpp/2601'

async function fetchWith(body: string, identifier = 'PAXX') {
  const fetcher = new FakeFetcher({
    [`https://api.aviationapi.com/v1/charts?apt=${identifier}`]: okPage(body),
  })
  const result = await aviationApiAdapter.fetch(
    identifier,
    knownDescriptor('aviationapi'),
    adapterContext({ fetcher })
  )
  return { fetcher, result }
}

describe('aviationapi contract', () => {
  it('categorizes a flat listing by chart code', async () => {
    const body = readFixture(import.meta.url, '../fixtures/paxx-flat.json')
    const { fetcher, result } = await fetchWith(body)

    expect(fetcher.calls[0]?.options?.headers).toEqual({ Accept: 'application/json' })
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(buildChartRecords(result.pageUrl, result.rawCharts)).toEqual([
      { title: 'TAKEOFF MINIMUMS', url: `${TPP}/ak1to.pdf`, category: 'General' },
      { title: 'AIRPORT DIAGRAM', url: `${TPP}/00001ad.pdf`, category: 'Ground' },
      { title: 'NORTHERN FOUR', url: `${TPP}/00001north.pdf`, category: 'DepartureProcedure' },
      { title: 'GLACIER TWO', url: `${TPP}/00001glacier.pdf`, category: 'ArrivalProcedure' },
      { title: 'ILS OR LOC RWY 07R', url: `${TPP}/00001il7r.pdf`, category: 'Approach' },
    ])
  })

  it('uses the group name when items carry no chart code', async () => {
    const { result } = await fetchWith(
      readFixture(import.meta.url, '../fixtures/paxx-grouped.json')
    )
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const records = buildChartRecords(result.pageUrl, result.rawCharts)
    expect(records.map((chart) => chart.category)).toEqual([
      'Ground',
      'DepartureProcedure',
      'ArrivalProcedure',
      'Approach',
    ])
  })

  it('treats an empty listing as no charts and a missing key as NotFound', async () => {
    const { result } = await fetchWith('{"PAQQ": []}', 'PAQQ')
    expect(result).toEqual({
      ok: true,
      pageUrl: 'https://api.aviationapi.com/v1/charts?apt=PAQQ',
      rawCharts: [],
    })

    const missing = await fetchWith('{}')
    expect(missing.result).toEqual({
      ok: false,
      kind: 'NotFound',
      details: 'aviationapi.com has no charts for PAXX',
    })
  })

  it('rejects a payload of the wrong shape as ParseMismatch', async () => {
    const { result } = await fetchWith('{"PAXX": [{"chart_name": 7}]}')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.kind).toBe('ParseMismatch')
    expect(result.details.startsWith(`Unexpected JSON from ${REQUEST}: `)).toBe(true)
  })

  it('rejects a body that is not JSON', async () => {
    const { result } = await fetchWith('<html>rate limited</html>')
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.kind).toBe('ParseMismatch')
  })
})
