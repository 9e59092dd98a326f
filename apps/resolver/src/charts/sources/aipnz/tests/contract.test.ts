import { describe, expect, it } from 'vitest'
import { DEFAULT_OFFLINE_DATA_DIR } from '../../../../config/index.js'
import { adapterContext, FakeFetcher, knownDescriptor } from '../../../__tests__/fakes.js'
import { JsonFileChartStore, MemoryChartStore } from '../../../offline/json-store.js'
import { buildChartRecords } from '../../../resolver.js'
import { aipnzAdapter } from '../index.js'

describe('aipnz contract', () => {
  it('reads the shipped database without touching the network', async () => {
    const fetcher = new FakeFetcher()
    const offlineStore = new JsonFileChartStore(DEFAULT_OFFLINE_DATA_DIR)
    const result = await aipnzAdapter.fetch(
      'NZWN',
      knownDescriptor('aipnz'),
      adapterContext({ fetcher, offlineStore })
    )

    expect(fetcher.calls).toEqual([])
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.pageUrl).toBe('https://www.aip.net.nz/')
    expect(buildChartRecords(result.pageUrl, result.rawCharts)).toEqual([
      {
        title: 'Aerodrome Chart',
        url: 'https://www.aip.net.nz/assets/AIP/Aerodrome-Charts/Wellington-NZWN/NZWN_20.1.pdf',
        category: 'Ground',
      },
      {
        title: 'SID RWY 34',
        url: 'https://www.aip.net.nz/assets/AIP/Aerodrome-Charts/Wellington-NZWN/NZWN_45.1.pdf',
        category: 'DepartureProcedure',
      },
      {
        title: 'RNP RWY 16',
        url: 'https://www.aip.net.nz/assets/AIP/Aerodrome-Charts/Wellington-NZWN/NZWN_52.1.pdf',
        category: 'Approach',
      },
    ])
  })

  it('keeps a stored category as the section hint', async () => {
    const offlineStore = new JsonFileChartStore(DEFAULT_OFFLINE_DATA_DIR)
    const result = await aipnzAdapter.fetch(
      'NZCH',
      knownDescriptor('aipnz'),
      adapterContext({ offlineStore })
    )
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.rawCharts[1]).toEqual({
      title: 'Visual Arrival Procedures',
      locator: 'https://www.aip.net.nz/assets/AIP/Aerodrome-Charts/Christchurch-NZCH/NZCH_30.1.pdf',
      sectionHint: 'ArrivalProcedure',
    })
  })

  it('reports an airport missing from the database as NotFound', async () => {
    const offlineStore = new MemoryChartStore({ aipnz: { NZAA: { charts: [] } } })
    const result = await aipnzAdapter.fetch(
      'NZXX',
      knownDescriptor('aipnz'),
      adapterContext({ offlineStore })
    )
    expect(result).toEqual({
      ok: false,
      kind: 'NotFound',
      details: 'NZXX is not in the aipnz offline database',
    })
  })

  it('reports a missing database file as UpstreamUnavailable', async () => {
    const offlineStore = new JsonFileChartStore('/nonexistent/offline')
    const result = await aipnzAdapter.fetch(
      'NZAA',
      knownDescriptor('aipnz'),
      adapterContext({ offlineStore })
    )
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.kind).toBe('UpstreamUnavailable')
    const prefix = 'Offline database unreadable at /nonexistent/offline/aipnz.json'
    expect(result.details.startsWith(prefix)).toBe(true)
  })

  it('needs a store', async () => {
    const result = await aipnzAdapter.fetch('NZAA', knownDescriptor('aipnz'), adapterContext())
    expect(result).toEqual({
      ok: false,
      kind: 'UpstreamUnavailable',
      details: 'No offline chart store configured',
    })
  })
})
