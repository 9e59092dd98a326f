/** Where commands write. Tests pass a recorder; the entry point passes the console. */
export interface CliOutput {
  log(line: string): void
  error(line: string): void
}

export const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
}

export const EXIT_OK = 0
export const EXIT_RESOLUTION_FAILED = 1
export const EXIT_USAGE = 2
