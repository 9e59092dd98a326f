import { describeFailure, isRetryable } from '../../charts/errors.js'
import { identifierSchema } from '../../charts/identifier.js'
import type { ChartResolver } from '../../charts/resolver.js'
import { groupByCategory } from '../../charts/resolver.js'
import { CHART_CATEGORIES, isChartCategory, type ChartCategory } from '../../charts/types.js'
import { EXIT_OK, EXIT_RESOLUTION_FAILED, EXIT_USAGE, type CliOutput } from '../output.js'

export interface ChartsCommandArgs {
  identifier: string
  sourceId?: string
  category?: string
  json: boolean
}

export interface ChartsCommandDeps {
  resolver: Pick<ChartResolver, 'resolve'>
  out: CliOutput
}

export const CATEGORY_LABELS: Record<ChartCategory, string> = {
  General: 'General',
  Ground: 'Ground',
  DepartureProcedure: 'Departure procedures',
  ArrivalProcedure: 'Arrival procedures',
  Approach: 'Approaches',
}

export async function runChartsCommand(
  args: ChartsCommandArgs,
  deps: ChartsCommandDeps
): Promise<number> {
  const { out } = deps
  const identifier = identifierSchema.safeParse(args.identifier)
  if (!identifier.success) {
    const reason = identifier.error.issues[0]?.message ?? 'invalid'
    out.error(`Invalid airport identifier "${args.identifier}": ${reason}`)
    out.error('Usage: charts <ICAO> [--source <id>] [--category <label>] [--json]')
    return EXIT_USAGE
  }

  let category: ChartCategory | undefined
  if (args.category) {
    if (!isChartCategory(args.category)) {
      out.error(
        `Unknown category "${args.category}". Expected one of: ${CHART_CATEGORIES.join(', ')}`
      )
      return EXIT_USAGE
    }
    category = args.category
  }

  const result = await deps.resolver.resolve(identifier.data, {
    sourceId: args.sourceId || undefined,
  })

  if (!result.ok) {
    const { failure } = result
    if (args.json) {
      out.log(
        JSON.stringify(
          {
            ok: false,
            error: {
              kind: failure.kind,
              message: describeFailure(failure),
              retryable: isRetryable(failure.kind),
            },
          },
          null,
          2
        )
      )
    } else {
      out.error(describeFailure(failure))
    }
    return EXIT_RESOLUTION_FAILED
  }

  const charts = category
    ? result.charts.filter((chart) => chart.category === category)
    : result.charts

  if (args.json) {
    out.log(
      JSON.stringify(
        {
          ok: true,
          identifier: result.identifier,
          source: result.source,
          fetchedAt: result.fetchedAt.toISOString(),
          charts,
        },
        null,
        2
      )
    )
    return EXIT_OK
  }

  const from = `${result.source.name} [${result.source.id}]`
  if (charts.length === 0) {
    const scope = category ? ` in ${CATEGORY_LABELS[category]}` : ''
    out.log(`${result.identifier}: no charts${scope} published by ${from}`)
    return EXIT_OK
  }

  const noun = charts.length === 1 ? 'chart' : 'charts'
  out.log(`${result.identifier}: ${charts.length} ${noun} from ${from}`)
  const grouped = groupByCategory(charts)
  for (const label of CHART_CATEGORIES) {
    const group = grouped[label]
    if (group.length === 0) continue
    out.log('')
    out.log(`${CATEGORY_LABELS[label]} (${group.length})`)
    for (const chart of group) {
      out.log(`  ${chart.title}`)
      out.log(`    ${chart.url}`)
    }
  }
  return EXIT_OK
}
