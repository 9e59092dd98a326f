export interface ParsedArgs {
  positionals: string[]
  flags: Record<string, string | boolean>
}

/**
 * `--name value` pairs plus positionals. Flags listed in `booleans` never
 * take a value, so `--json KJFK` keeps KJFK positional.
 */
export function parseFlags(argv: string[], booleans: readonly string[] = []): ParsedArgs {
  const positionals: string[] = []
  const flags: Record<string, string | boolean> = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      positionals.push(token)
      continue
    }

    const raw = token.slice(2)
    const eq = raw.indexOf('=')
    if (eq >= 0) {
      flags[raw.slice(0, eq)] = raw.slice(eq + 1)
      continue
    }

    const next = argv[i + 1]
    if (!booleans.includes(raw) && next !== undefined && !next.startsWith('--')) {
      flags[raw] = next
      i++
    } else {
      flags[raw] = true
    }
  }

  return { positionals, flags }
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}
