import type { ChartResolver } from '../../charts/resolver.js'
import { EXIT_OK, type CliOutput } from '../output.js'

export interface SourcesCommandDeps {
  resolver: Pick<ChartResolver, 'listSources'>
  out: CliOutput
}

export function runSourcesCommand(json: boolean, deps: SourcesCommandDeps): number {
  const sources = deps.resolver.listSources()
  if (json) {
    deps.out.log(JSON.stringify(sources, null, 2))
    return EXIT_OK
  }

  const idWidth = Math.max(...sources.map((source) => source.id.length))
  for (const source of sources) {
    const flags = source.isOffline ? ' (offline)' : ''
    const columns = [
      source.id.padEnd(idWidth),
      source.adapterKind.padEnd(17),
      source.identifierPrefixes.join(','),
      `${source.name}${flags}`,
    ]
    deps.out.log(columns.join('  '))
  }
  return EXIT_OK
}
