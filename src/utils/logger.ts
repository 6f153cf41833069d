/**
 * Structured JSON logger, zero-dependency.
 *
 *   import { logger } from '../utils/logger'
 *   const log = logger.child({ component: 'reference' })
 *   log.info('Reference data loaded', { rates: 29 })
 *
 * Writes one JSON object per line:
 *   {"timestamp":"2026-01-01T00:00:00.000Z","level":"info","message":"Reference data loaded","component":"reference","rates":29}
 *
 * The threshold comes from LOG_LEVEL (default "info"). `error` goes to
 * stderr, everything else to stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

export function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

export type LogContext = Record<string, unknown>

/** Receives every formatted line that passes the threshold. */
export type LogSink = (level: LogLevel, line: string) => void

const processSink: LogSink = (level, line) => {
  if (level === 'error') {
    process.stderr.write(line + '\n')
  } else {
    process.stdout.write(line + '\n')
  }
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
}

export interface Log {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  child(defaults: LogContext): Log
}

export class Logger implements Log {
  private threshold: number
  private readonly sink: LogSink

  constructor(options: LoggerOptions = {}) {
    const effective = options.level ?? resolveLevel(process.env.LOG_LEVEL)
    this.threshold = LEVEL_PRIORITY[effective]
    this.sink = options.sink ?? processSink
  }

  get level(): LogLevel {
    return LOG_LEVELS[this.threshold]
  }

  /** Children created earlier follow the new threshold too. */
  setLevel(level: LogLevel): void {
    this.threshold = LEVEL_PRIORITY[level]
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= this.threshold
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    }

    this.sink(level, JSON.stringify(entry))
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context)
  }

  /** Logger that injects fixed context fields into every line. */
  child(defaults: LogContext): Log {
    return new ChildLogger(this, defaults)
  }
}

class ChildLogger implements Log {
  constructor(
    private parent: Log,
    private defaults: LogContext,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  child(defaults: LogContext): Log {
    return new ChildLogger(this, defaults)
  }
}

export const logger = new Logger()
