/**
 * OfflineDatabase adapter: reads a pre-built keyed store. No network I/O.
 */

import {
  adapterFailure,
  adapterSuccess,
  isChartCategory,
  type ChartAdapter,
  type RawChart,
} from '../types.js'

export function createOfflineDatabaseAdapter(): ChartAdapter {
  return {
    kind: 'OfflineDatabase',
    async fetch(identifier, descriptor, context) {
      if (!context.offlineStore) {
        return adapterFailure('UpstreamUnavailable', 'No offline chart store configured')
      }

      const found = await context.offlineStore.lookup(descriptor.id, identifier)
      if (!found.ok) return adapterFailure(found.kind, found.details)
      if (!found.entry) {
        return adapterFailure(
          'NotFound',
          `${identifier} is not in the ${descriptor.id} offline database`
        )
      }

      const rawCharts = found.entry.charts.map((chart): RawChart => {
        const raw: RawChart = { title: chart.name, locator: chart.url }
        if (chart.category && isChartCategory(chart.category)) raw.sectionHint = chart.category
        return raw
      })
      return adapterSuccess(descriptor.baseEndpoint, rawCharts)
    },
  }
}
