import { CHART_SOURCES, type SourceDescriptor } from '@aerochart/chart-sources'
import { silentLogger } from '@aerochart/logger'
import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { FakeFetcher, TEST_NOW } from '../../charts/__tests__/fakes.js'
import { SourceRegistry } from '../../charts/registry.js'
import { ChartResolver } from '../../charts/resolver.js'
import type { ChartAdapter, RawChart } from '../../charts/types.js'
import { runChartsCommand } from '../commands/charts.js'
import { runRouteCommand } from '../commands/route.js'
import { runSourcesCommand } from '../commands/sources.js'
import type { CliOutput } from '../output.js'

const DEMO: SourceDescriptor = {
  id: 'demo',
  name: 'Demo Authority',
  identifierPrefixes: ['K'],
  adapterKind: 'StaticHTML',
  baseEndpoint: 'https://charts.example.test/',
  timeoutClass: 'fast',
  isOffline: false,
}

const KXXX_CHARTS: RawChart[] = [
  { title: 'SID RWY 04L', locator: 'sid-04l.pdf' },
  { title: 'ILS RWY 22', locator: 'ils-22.pdf' },
  { title: 'AIRPORT DIAGRAM', locator: 'apd.pdf' },
]

function recorder(): CliOutput & { lines: string[]; errors: string[] } {
  const lines: string[] = []
  const errors: string[] = []
  return { lines, errors, log: (line) => lines.push(line), error: (line) => errors.push(line) }
}

function resolverWith(rawCharts: RawChart[] | 'missing'): ChartResolver {
  const adapter: ChartAdapter = {
    kind: 'StaticHTML',
    async fetch(identifier) {
      if (rawCharts === 'missing') {
        return { ok: false, kind: 'NotFound', details: `no page for ${identifier}` }
      }
      return { ok: true, pageUrl: `https://charts.example.test/${identifier}/`, rawCharts }
    },
  }
  return new ChartResolver({
    registry: new SourceRegistry([DEMO]),
    adapterFor: (id) => (id === 'demo' ? adapter : undefined),
    fetcher: new FakeFetcher(),
    timeouts: { fast: 1000, moderate: 1000, slow: 1000 },
    logger: silentLogger,
    now: () => TEST_NOW,
  })
}

describe('charts command', () => {
  it('prints charts grouped by category', async () => {
    const out = recorder()
    const code = await runChartsCommand(
      { identifier: 'kxxx', json: false },
      { resolver: resolverWith(KXXX_CHARTS), out }
    )

    expect(code).toBe(0)
    expect(out.lines).toEqual([
      'KXXX: 3 charts from Demo Authority [demo]',
      '',
      'Ground (1)',
      '  AIRPORT DIAGRAM',
      '    https://charts.example.test/KXXX/apd.pdf',
      '',
      'Departure procedures (1)',
      '  SID RWY 04L',
      '    https://charts.example.test/KXXX/sid-04l.pdf',
      '',
      'Approaches (1)',
      '  ILS RWY 22',
      '    https://charts.example.test/KXXX/ils-22.pdf',
    ])
  })

  it('filters by category and prints JSON', async () => {
    const out = recorder()
    const code = await runChartsCommand(
      { identifier: 'KXXX', category: 'Approach', json: true },
      { resolver: resolverWith(KXXX_CHARTS), out }
    )

    expect(code).toBe(0)
    expect(JSON.parse(out.lines.join('\n'))).toEqual({
      ok: true,
      identifier: 'KXXX',
      source: { id: 'demo', name: 'Demo Authority' },
      fetchedAt: '2026-01-15T12:00:00.000Z',
      charts: [
        {
          title: 'ILS RWY 22',
          url: 'https://charts.example.test/KXXX/ils-22.pdf',
          category: 'Approach',
        },
      ],
    })
  })

  it('treats no charts as success', async () => {
    const out = recorder()
    const code = await runChartsCommand(
      { identifier: 'KXXX', json: false },
      { resolver: resolverWith([]), out }
    )
    expect(code).toBe(0)
    expect(out.lines).toEqual(['KXXX: no charts published by Demo Authority [demo]'])
  })

  it('exits 1 with a distinct message per failure kind', async () => {
    const unknown = recorder()
    expect(
      await runChartsCommand(
        { identifier: 'ZZZZ', json: false },
        { resolver: resolverWith(KXXX_CHARTS), out: unknown }
      )
    ).toBe(1)
    expect(unknown.errors).toEqual([
      'Unknown airport: no chart source covers this identifier (ZZZZ): ' +
        'No chart source is configured for prefix of ZZZZ',
    ])

    const missing = recorder()
    expect(
      await runChartsCommand(
        { identifier: 'KQQQ', json: false },
        { resolver: resolverWith('missing'), out: missing }
      )
    ).toBe(1)
    expect(missing.errors).toEqual([
      'Airport not found at its chart source (demo, KQQQ): no page for KQQQ',
    ])
  })

  it('reports failures as JSON when asked', async () => {
    const out = recorder()
    await runChartsCommand(
      { identifier: 'KQQQ', json: true },
      { resolver: resolverWith('missing'), out }
    )
    expect(JSON.parse(out.lines.join('\n'))).toEqual({
      ok: false,
      error: {
        kind: 'NotFound',
        message: 'Airport not found at its chart source (demo, KQQQ): no page for KQQQ',
        retryable: false,
      },
    })
  })

  it('exits 2 on usage errors', async () => {
    const badId = recorder()
    expect(
      await runChartsCommand(
        { identifier: 'K!', json: false },
        { resolver: resolverWith([]), out: badId }
      )
    ).toBe(2)

    const badCategory = recorder()
    expect(
      await runChartsCommand(
        { identifier: 'KXXX', category: 'Taxi', json: false },
        { resolver: resolverWith([]), out: badCategory }
      )
    ).toBe(2)
    expect(badCategory.errors).toEqual([
      'Unknown category "Taxi". Expected one of: ' +
        'General, Ground, DepartureProcedure, ArrivalProcedure, Approach',
    ])
  })
})

describe('route command', () => {
  it('names the owning source without fetching', () => {
    const out = recorder()
    const code = runRouteCommand('sbgr', { registry: new SourceRegistry(CHART_SOURCES), out })
    expect(code).toBe(0)
    expect(out.lines).toEqual([
      'SBGR -> decea (DECEA (Brazil)) via prefix SB, StaticHTML, moderate timeout',
    ])
  })

  it('exits 1 for an identifier no source covers', () => {
    const out = recorder()
    expect(runRouteCommand('ZZZZ', { registry: new SourceRegistry(CHART_SOURCES), out })).toBe(1)
  })
})

describe('sources command', () => {
  it('lists every shipped source', () => {
    const out = recorder()
    runSourcesCommand(true, { resolver: new SourceRegistry(CHART_SOURCES), out })
    const listed = z.array(z.object({ id: z.string() })).parse(JSON.parse(out.lines.join('\n')))
    expect(listed.map((entry) => entry.id)).toEqual([
      'aipnz',
      'anac',
      'aviationapi',
      'avinor',
      'decea',
      'enaire',
      'faa',
    ])
  })
})
