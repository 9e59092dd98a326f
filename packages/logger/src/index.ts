/**
 * @aerochart/logger
 *
 * Structured logging for the chart resolver and its tools.
 *
 * - JSON lines in production, colored single lines in development
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers inherit component path and context
 * - Query strings of URL-valued fields are redacted (tokens travel in queries)
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level. Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'
export type LogFormat = 'json' | 'pretty'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    stack?: string
  }
  [key: string]: unknown
}

/** Receives every entry that passes the level threshold. */
export type LogSink = (entry: LogEntry, formatted: string) => void

export interface LoggerOptions {
  /** Fixed level; when absent LOG_LEVEL is read on every call */
  level?: LogLevel
  /** Fixed format; when absent LOG_FORMAT / NODE_ENV decide */
  format?: LogFormat
  /** Replaces console output */
  sink?: LogSink
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

export function levelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

export function formatFromEnv(): LogFormat {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

/**
 * Strip query and fragment from absolute http(s) URLs.
 * Non-URL strings come back untouched.
 */
export function redactUrl(value: string): string {
  if (!/^https?:\/\//i.test(value)) return value
  try {
    const url = new URL(value)
    const hadQuery = url.search.length > 0
    url.search = ''
    url.hash = ''
    return hadQuery ? `${url.toString()}?[redacted]` : url.toString()
  } catch {
    return value
  }
}

function redactContext(context: LogContext): LogContext {
  const out: LogContext = {}
  for (const [key, value] of Object.entries(context)) {
    out[key] = typeof value === 'string' ? redactUrl(value) : value
  }
  return out
}

function serializeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return { name: 'UnknownError', message: String(error) }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const path = component ? `${service}:${component}` : service
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack ?? error.message}${RESET}` : ''

  const label = `${LEVEL_COLORS[level]}${BRIGHT}${level.toUpperCase().padEnd(5)}${RESET}`
  const where = `${DIM}${timestamp}${RESET} ${label} ${DIM}[${path}]${RESET}`
  return `${where} ${message}${metaStr}${errorStr}`
}

function writeToConsole(entry: LogEntry, formatted: string): void {
  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
      break
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /** Nested component (`charts:faa`) with extra default context */
  child(component: string, defaultContext?: LogContext): ILogger
  /** Same component, extra default context */
  withContext(context: LogContext): ILogger
}

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component: string | undefined = undefined,
    private readonly defaultContext: LogContext = {},
    private readonly options: LoggerOptions = {}
  ) {}

  private emit(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    const threshold = this.options.level ?? levelFromEnv()
    if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...redactContext({ ...this.defaultContext, ...meta }),
    }
    if (this.component) entry.component = this.component
    if (error !== undefined) entry.error = serializeError(error)

    const format = this.options.format ?? formatFromEnv()
    const formatted = format === 'json' ? formatJson(entry) : formatPretty(entry)
    const sink = this.options.sink ?? writeToConsole
    sink(entry, formatted)
  }

  debug(message: string, meta?: LogContext): void {
    this.emit('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.emit('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.emit('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.emit('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.emit('fatal', message, meta, error)
  }

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const path = this.component ? `${this.component}:${component}` : component
    const context = { ...this.defaultContext, ...defaultContext }
    return new Logger(this.service, path, context, this.options)
  }

  withContext(context: LogContext): ILogger {
    const merged = { ...this.defaultContext, ...context }
    return new Logger(this.service, this.component, merged, this.options)
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('resolver')
 * logger.child('faa').info('Fetched airport page', { icao: 'KJFK' })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}

/** Logger that drops everything. Handy as a default in tests. */
export const silentLogger: ILogger = createLogger('silent', { sink: () => undefined })
