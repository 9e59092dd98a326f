import '../env.js'
import { createChartService } from '../charts/index.js'
import { getSourceRegistry } from '../charts/registry.js'
import { loadConfig } from '../config/index.js'
import { loggers } from '../config/logger.js'
import { runChartsCommand } from './commands/charts.js'
import { runRouteCommand } from './commands/route.js'
import { runSourcesCommand } from './commands/sources.js'
import { consoleOutput, EXIT_USAGE } from './output.js'
import { asString, parseFlags } from './parse-flags.js'

const BOOLEAN_FLAGS = ['json', 'help'] as const

function printHelp(): void {
  console.log('Aerodrome chart resolver')
  console.log('')
  console.log('Commands:')
  console.log('  charts <ICAO> [--source <id>] [--category <label>] [--json]')
  console.log('  sources [--json]')
  console.log('  route <ICAO>')
  console.log('')
  console.log('Exit codes: 0 success, 1 resolution failure, 2 usage error')
}

async function main(): Promise<number> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return 0
  }

  const { positionals, flags } = parseFlags(rest, BOOLEAN_FLAGS)
  if (flags.help === true) {
    printHelp()
    return 0
  }

  switch (command) {
    case 'charts': {
      const [identifier = ''] = positionals
      const service = createChartService(loadConfig(), loggers.charts)
      try {
        return await runChartsCommand(
          {
            identifier,
            sourceId: asString(flags.source) || undefined,
            category: asString(flags.category) || undefined,
            json: flags.json === true,
          },
          { resolver: service.resolver, out: consoleOutput }
        )
      } finally {
        await service.close()
      }
    }
    case 'sources':
      return runSourcesCommand(flags.json === true, {
        resolver: getSourceRegistry(),
        out: consoleOutput,
      })
    case 'route':
      return runRouteCommand(positionals[0] ?? '', {
        registry: getSourceRegistry(),
        out: consoleOutput,
      })
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return EXIT_USAGE
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    loggers.cli.fatal('Chart CLI crashed', {}, error)
    process.exit(1)
  })
