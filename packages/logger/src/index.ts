/**
 * @reaction-harvest/logger
 *
 * Structured logging for the harvester and its CLI.
 *
 * Features:
 * - JSON-formatted output for production (machine-parseable)
 * - Colored output for development (human-readable)
 * - ISO 8601 timestamps
 * - Log levels: debug, info, warn, error, fatal
 * - Child loggers with inherited component path and context
 *
 * Log lines go to stderr so that CLI results on stdout stay pipeable.
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: Output format (json, pretty). Default: json in production, pretty otherwise
 * - NODE_ENV: Used to determine defaults
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

/** Receives each formatted line; defaults to stderr. */
export type LogSink = (line: string, entry: LogEntry) => void

export interface LoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel
  /** Overrides LOG_FORMAT */
  format?: LogFormat
  sink?: LogSink
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
  fatal: '\x1b[35m', // Magenta
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

export function resolveLogLevel(raw: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const level = raw?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

export function resolveLogFormat(
  raw: string | undefined = process.env.LOG_FORMAT,
  nodeEnv: string | undefined = process.env.NODE_ENV
): LogFormat {
  const format = raw?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return nodeEnv === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

export function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component
    ? `${entry.service}:${entry.component}`
    : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr =
    Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''

  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

const stderrSink: LogSink = line => {
  process.stderr.write(`${line}\n`)
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger.
   * @param componentOrContext - Component name appended to the path, or extra context
   * @param defaultContext - Extra context (only used when first arg is a string)
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext
  private readonly options: LoggerOptions

  constructor(
    service: string,
    component?: string,
    defaultContext: LogContext = {},
    options: LoggerOptions = {}
  ) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
    this.options = options
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    const minLevel = this.options.level ?? resolveLogLevel()
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...this.defaultContext,
      ...meta,
    }

    if (this.component) {
      entry.component = this.component
    }

    const errorData = error ? formatError(error) : undefined
    if (errorData) {
      entry.error = errorData
    }

    const format = this.options.format ?? resolveLogFormat()
    const line = format === 'json' ? formatJson(entry) : formatPretty(entry)
    const sink = this.options.sink ?? stderrSink
    sink(line, entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(
        this.service,
        this.component,
        { ...this.defaultContext, ...componentOrContext },
        this.options
      )
    }
    const newComponent = this.component
      ? `${this.component}:${componentOrContext}`
      : componentOrContext
    return new Logger(
      this.service,
      newComponent,
      { ...this.defaultContext, ...defaultContext },
      this.options
    )
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * import { createLogger } from '@reaction-harvest/logger'
 *
 * const logger = createLogger('harvester')
 * logger.info('Run started', { doi: '10.1000/example' })
 *
 * const scraperLogger = logger.child('scraper')
 * scraperLogger.info('Page fetched', { page: 1 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}

/** Logger that drops everything; handy as a default collaborator in tests. */
export const silentLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => silentLogger,
}
