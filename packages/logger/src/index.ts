/**
 * @planwatch/logger
 *
 * Structured console logging for planwatch apps.
 *
 * Every entry carries an ISO timestamp, the level, the service and (for child
 * loggers) a component path such as `cli:run`. Context passed to `child()` is
 * merged into each entry the child writes.
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: json or pretty. Default: json in production, pretty elsewhere
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

export interface SerializedError {
  name: string
  message: string
  stack?: string
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: SerializedError
  [key: string]: unknown
}

interface LevelSpec {
  rank: number
  color: string
  write: (line: string) => void
}

// Console methods are looked up per call so test spies see the writes
const LEVELS: Record<LogLevel, LevelSpec> = {
  debug: { rank: 0, color: '\x1b[36m', write: line => console.debug(line) }, // cyan
  info: { rank: 1, color: '\x1b[32m', write: line => console.info(line) }, // green
  warn: { rank: 2, color: '\x1b[33m', write: line => console.warn(line) }, // yellow
  error: { rank: 3, color: '\x1b[31m', write: line => console.error(line) }, // red
  fatal: { rank: 4, color: '\x1b[35m', write: line => console.error(line) }, // magenta
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bright: '\x1b[1m',
} as const

let levelOverride: LogLevel | null = null

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, value)
}

/**
 * Force a minimum level regardless of LOG_LEVEL. Pass null to go back to the
 * environment value.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

export function getLogLevel(): LogLevel {
  if (levelOverride) {
    return levelOverride
  }
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function isEnabled(level: LogLevel): boolean {
  return LEVELS[level].rank >= LEVELS[getLogLevel()].rank
}

function usePrettyFormat(): boolean {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format === 'pretty'
  }
  return process.env.NODE_ENV !== 'production'
}

export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: String(error) }
  }
  return { name: error.name, message: error.message, stack: error.stack }
}

/**
 * One-line colored rendering for terminals:
 * `<timestamp> LEVEL [service:component] message {meta}`, with the error
 * stack indented on the next line.
 */
export function formatPretty(entry: LogEntry): string {
  const { timestamp, level, service, component, message, error, ...meta } = entry
  const { reset, dim, bright } = ANSI

  const scope = component ? `${service}:${component}` : service
  const head = `${dim}${timestamp}${reset} ${LEVELS[level].color}${bright}${level.toUpperCase().padEnd(5)}${reset}`

  // Leftover keys are the caller's context
  const metaPart = Object.keys(meta).length > 0 ? ` ${dim}${JSON.stringify(meta)}${reset}` : ''
  const errorPart = error ? `\n  ${dim}${error.stack || error.message}${reset}` : ''

  return `${head} ${dim}[${scope}]${reset} ${message}${metaPart}${errorPart}`
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger. The component name is appended to the parent's
   * path (`scraper:pricing`) and the context is merged into every entry.
   */
  child(component: string, defaultContext?: LogContext): ILogger
}

interface LoggerScope {
  service: string
  component?: string
  context: LogContext
}

export class Logger implements ILogger {
  private readonly scope: LoggerScope

  constructor(service: string, component?: string, defaultContext: LogContext = {}) {
    this.scope = { service, component, context: defaultContext }
  }

  private write(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!isEnabled(level)) return

    const { service, component, context } = this.scope
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service,
      message,
      ...context,
      ...meta,
      ...(component ? { component } : {}),
      ...(error === undefined || error === null ? {} : { error: serializeError(error) }),
    }

    LEVELS[level].write(usePrettyFormat() ? formatPretty(entry) : JSON.stringify(entry))
  }

  debug(message: string, meta?: LogContext): void {
    this.write('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.write('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.write('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.write('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.write('fatal', message, meta, error)
  }

  child(component: string, defaultContext: LogContext = {}): ILogger {
    const { service, component: parent, context } = this.scope
    return new Logger(service, parent ? `${parent}:${component}` : component, {
      ...context,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('harvester')
 * logger.info('Report written', { rows: 14 })
 *
 * const pricing = logger.child('pricing')
 * pricing.warn('Retrying pricing request', { attempt: 1 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
