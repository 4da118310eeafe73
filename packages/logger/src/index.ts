/**
 * @sorteo/logger
 *
 * Structured logging for the sorteo harvester and its tooling.
 *
 * - JSON lines in production, colored lines in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers that inherit service, component and context
 * - Optional append-only file sink next to the console output
 *
 * Environment variables:
 * - LOG_LEVEL: minimum level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: json | pretty. Default: json in production, pretty otherwise
 * - LOG_FILE: when set, every entry is also appended to this file as JSON
 * - NODE_ENV: used to pick the default format
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

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

/**
 * Where formatted entries go. The console sink is the default; tests and the
 * file sink plug in here.
 */
export interface LogSink {
  write(entry: LogEntry): void
}

export interface LoggerOptions {
  level?: LogLevel
  format?: LogFormat
  /** Extra sinks. When omitted, sinks are derived from the environment. */
  sinks?: LogSink[]
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

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value)
}

function envLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function envLogFormat(): LogFormat {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function formatError(error: unknown): LogEntry['error'] {
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
  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack ?? error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

/**
 * Writes to stdout/stderr through the console, keeping levels apart so
 * platform log collectors can tell them apart.
 */
export class ConsoleSink implements LogSink {
  constructor(private readonly format: LogFormat = envLogFormat()) {}

  write(entry: LogEntry): void {
    const formatted = this.format === 'json' ? formatJson(entry) : formatPretty(entry)

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
}

/**
 * Appends one JSON line per entry. Writes are synchronous so a job that exits
 * right after logging does not lose its last lines.
 */
export class FileSink implements LogSink {
  private prepared = false

  constructor(readonly path: string) {}

  write(entry: LogEntry): void {
    if (!this.prepared) {
      mkdirSync(dirname(this.path), { recursive: true })
      this.prepared = true
    }
    appendFileSync(this.path, `${formatJson(entry)}\n`, 'utf-8')
  }
}

function envSinks(): LogSink[] {
  const sinks: LogSink[] = [new ConsoleSink()]
  const file = process.env.LOG_FILE?.trim()
  if (file) {
    sinks.push(new FileSink(file))
  }
  return sinks
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger.
   * A string extends the component path; an object only adds context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly level: LogLevel | undefined
  private readonly sinks: LogSink[]

  constructor(
    private readonly service: string,
    private readonly component?: string,
    private readonly defaultContext: LogContext = {},
    options: LoggerOptions = {}
  ) {
    this.level = options.level
    this.sinks = options.sinks ?? (options.format ? [new ConsoleSink(options.format)] : envSinks())
  }

  private shouldLog(level: LogLevel): boolean {
    // Read lazily so LOG_LEVEL set after import (dotenv) still applies
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level ?? envLogLevel()]
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!this.shouldLog(level)) return

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

    if (error !== undefined && error !== null) {
      entry.error = formatError(error)
    }

    for (const sink of this.sinks) {
      sink.write(entry)
    }
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
    const options: LoggerOptions = { level: this.level, sinks: this.sinks }

    if (typeof componentOrContext === 'object') {
      return new Logger(
        this.service,
        this.component,
        { ...this.defaultContext, ...componentOrContext },
        options
      )
    }

    const component = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, component, { ...this.defaultContext, ...defaultContext }, options)
  }
}

/**
 * Create a logger for a service
 *
 * @example
 * ```ts
 * import { createLogger } from '@sorteo/logger'
 *
 * const logger = createLogger('harvester')
 * logger.info('Run started', { startDate: '2025-01-13' })
 *
 * const fetchLog = logger.child('fetcher')
 * fetchLog.warn('Retrying', { attempt: 2 })
 * ```
 */
export function createLogger(service: string, options: LoggerOptions = {}): ILogger {
  return new Logger(service, undefined, {}, options)
}

/**
 * Logger that drops everything. Handy default for library callers that do
 * not want output.
 */
export const silentLogger: ILogger = createLogger('silent', { sinks: [] })
