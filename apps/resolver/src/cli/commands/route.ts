import { identifierSchema } from '../../charts/identifier.js'
import { describeFailure } from '../../charts/errors.js'
import type { SourceRegistry } from '../../charts/registry.js'
import { EXIT_OK, EXIT_RESOLUTION_FAILED, EXIT_USAGE, type CliOutput } from '../output.js'

export interface RouteCommandDeps {
  registry: Pick<SourceRegistry, 'resolve'>
  out: CliOutput
}

/** Which source would serve an identifier. Nothing is fetched. */
export function runRouteCommand(rawIdentifier: string, deps: RouteCommandDeps): number {
  const identifier = identifierSchema.safeParse(rawIdentifier)
  if (!identifier.success) {
    deps.out.error(`Invalid airport identifier "${rawIdentifier}"`)
    deps.out.error('Usage: route <ICAO>')
    return EXIT_USAGE
  }

  const lookup = deps.registry.resolve(identifier.data)
  if (!lookup.ok) {
    deps.out.error(describeFailure(lookup.failure))
    return EXIT_RESOLUTION_FAILED
  }

  const { descriptor, prefix } = lookup
  const via = `via prefix ${prefix}, ${descriptor.adapterKind}, ${descriptor.timeoutClass} timeout`
  deps.out.log(`${identifier.data} -> ${descriptor.id} (${descriptor.name}) ${via}`)
  return EXIT_OK
}
