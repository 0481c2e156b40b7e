/**
 * Leveled Logger
 *
 * Console logger with namespaces and an in-memory aggregator of recent
 * entries. Levels mirror the severities a survey run reports, from
 * per-row debug traces up to the critical message logged before exit.
 */

/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 10,
  INFO = 20,
  WARN = 30,
  ERROR = 40,
  CRITICAL = 50,
}

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel
  timestamp: string
  namespace?: string
  message: string
  context?: Record<string, unknown>
  error?: Error
}

/**
 * Log aggregator interface
 */
export interface LogAggregator {
  add(entry: LogEntry): void
  getLogs(): LogEntry[]
  clear(): void
}

/**
 * Logger interface
 */
export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void
  info: (message: string, context?: Record<string, unknown>) => void
  warn: (message: string, context?: Record<string, unknown>) => void
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void
  critical: (message: string, error?: Error, context?: Record<string, unknown>) => void
}

/**
 * In-memory log aggregator
 */
class MemoryLogAggregator implements LogAggregator {
  private logs: LogEntry[] = []
  private maxSize: number

  constructor(maxSize = 10000) {
    this.maxSize = maxSize
  }

  add(entry: LogEntry): void {
    this.logs.push(entry)
    if (this.logs.length > this.maxSize) {
      this.logs.shift()
    }
  }

  getLogs(): LogEntry[] {
    return [...this.logs]
  }

  clear(): void {
    this.logs = []
  }
}

const globalAggregator: LogAggregator = new MemoryLogAggregator()

/**
 * Get the global log aggregator
 */
export function getLogAggregator(): LogAggregator {
  return globalAggregator
}

/**
 * Parse a level given by name ("warn", "CRITICAL") or number ("30").
 * Returns undefined for anything else.
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  const upper = value.trim().toUpperCase()
  switch (upper) {
    case 'DEBUG':
      return LogLevel.DEBUG
    case 'INFO':
      return LogLevel.INFO
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN
    case 'ERROR':
      return LogLevel.ERROR
    case 'CRITICAL':
      return LogLevel.CRITICAL
  }
  const numeric = Number.parseInt(upper, 10)
  if (Number.isNaN(numeric)) {
    return undefined
  }
  if (numeric <= LogLevel.DEBUG) return LogLevel.DEBUG
  if (numeric <= LogLevel.INFO) return LogLevel.INFO
  if (numeric <= LogLevel.WARN) return LogLevel.WARN
  if (numeric <= LogLevel.ERROR) return LogLevel.ERROR
  return LogLevel.CRITICAL
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL
  return (raw !== undefined ? parseLogLevel(raw) : undefined) ?? LogLevel.INFO
}

// null means "follow LOG_LEVEL"
let levelOverride: LogLevel | null = null

/**
 * Set the minimum level for every logger. Pass null to go back to LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level
}

export function getLogLevel(): LogLevel {
  return levelOverride ?? levelFromEnv()
}

/**
 * Format log entry for output
 */
export function formatLogEntry(entry: LogEntry, useJson: boolean): string {
  if (useJson) {
    return JSON.stringify({
      level: LogLevel[entry.level],
      timestamp: entry.timestamp,
      namespace: entry.namespace,
      message: entry.message,
      context: entry.context,
      error: entry.error
        ? {
            message: entry.error.message,
            stack: entry.error.stack,
          }
        : undefined,
    })
  }

  const prefix = entry.namespace ? `[skills-survey:${entry.namespace}]` : '[skills-survey]'
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : ''
  return `${LogLevel[entry.level]}: ${prefix} ${entry.message}${contextStr}`
}

function createLoggerInstance(namespace?: string): Logger {
  const shouldLog = (level: LogLevel): boolean => {
    // Keep test output clean unless a level was asked for explicitly
    if (process.env.NODE_ENV === 'test' && levelOverride === null && !process.env.LOG_LEVEL) {
      return level >= LogLevel.ERROR
    }
    return level >= getLogLevel()
  }

  const emit = (
    level: LogLevel,
    write: (line: string) => void,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void => {
    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      namespace,
      message,
      context,
      error,
    }
    const useJson = process.env.LOG_FORMAT === 'json'
    if (shouldLog(level)) {
      write(formatLogEntry(entry, useJson))
      if (error?.stack && !useJson && getLogLevel() === LogLevel.DEBUG) {
        write(error.stack)
      }
    }
    globalAggregator.add(entry)
  }

  return {
    debug: (message, context) => emit(LogLevel.DEBUG, console.debug, message, context),
    info: (message, context) => emit(LogLevel.INFO, console.info, message, context),
    warn: (message, context) => emit(LogLevel.WARN, console.warn, message, context),
    error: (message, error, context) => emit(LogLevel.ERROR, console.error, message, context, error),
    critical: (message, error, context) =>
      emit(LogLevel.CRITICAL, console.error, message, context, error),
  }
}

/**
 * Default logger instance
 *
 * Environment variables:
 * - LOG_LEVEL=DEBUG|INFO|WARN|ERROR|CRITICAL (or 10-50): minimum level, default INFO
 * - LOG_FORMAT=json: output logs as JSON lines
 * - NODE_ENV=test: only ERROR and CRITICAL reach the console unless LOG_LEVEL is set
 */
export const logger: Logger = createLoggerInstance()

/**
 * Create a namespaced logger
 *
 * @example
 * ```typescript
 * const log = createLogger('pipeline')
 * log.warn('MISSING - Your Name')
 * ```
 */
export function createLogger(namespace: string): Logger {
  return createLoggerInstance(namespace)
}

/**
 * No-op logger for testing or silent operation
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  critical: () => {},
}
