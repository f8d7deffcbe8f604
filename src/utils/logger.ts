/**
 * Structured JSON logger — lightweight, zero-dependency.
 *
 * Usage:
 *   import { logger } from './utils/logger'
 *   logger.info('Projection finished', { plan: 'baseline', years: 40 })
 *
 * Output (one JSON object per line):
 *   {"timestamp":"2025-06-01T12:00:00.000Z","level":"info","message":"Projection finished","plan":"baseline","years":40}
 *
 * Configure via LOG_LEVEL env var (default: "info").
 * Levels in ascending severity: debug, info, warn, error, silent
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

function resolveLevel(env: string | undefined): LogLevel {
  const raw = (env ?? 'info').toLowerCase()
  return isLogLevel(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** Where formatted lines go. Defaults to stdout/stderr. */
export interface LogSink {
  write(level: LogLevel, line: string): void
}

const processSink: LogSink = {
  write(level, line) {
    if (level === 'error') {
      process.stderr.write(line + '\n')
    } else {
      process.stdout.write(line + '\n')
    }
  },
}

/** The surface the engine depends on; satisfied by Logger and its children. */
export interface ProjectionLogger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
  child(defaults: Record<string, unknown>): ProjectionLogger
}

export class Logger implements ProjectionLogger {
  private threshold: number

  constructor(
    level?: LogLevel,
    private sink: LogSink = processSink,
  ) {
    const effective = level ?? resolveLevel(process.env.LOG_LEVEL)
    this.threshold = LEVEL_PRIORITY[effective]
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < this.threshold) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    }

    this.sink.write(level, JSON.stringify(entry))
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context)
  }

  /** Create a child logger that injects fixed context fields into every log line. */
  child(defaults: Record<string, unknown>): ProjectionLogger {
    return new ChildLogger(this, defaults)
  }
}

class ChildLogger implements ProjectionLogger {
  constructor(
    private parent: ProjectionLogger,
    private defaults: Record<string, unknown>,
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  child(defaults: Record<string, unknown>): ProjectionLogger {
    return new ChildLogger(this.parent, { ...this.defaults, ...defaults })
  }
}

/** Singleton logger instance for the library. */
export const logger = new Logger()
