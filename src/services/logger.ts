/**
 * Logger implementations: console, daily log file, silent and prefixed
 * @module services/logger
 */

import { appendFileSync, mkdirSync } from 'node:fs'
import { join } from 'node:path'
import type { Logger, LogLevel } from './types.js'
import { LOG_LEVELS } from './types.js'
import { formatDateStamp, formatLogTimestamp } from '../utils/time.js'

/**
 * Options for building a logger
 */
export interface LoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel

  /** Directory receiving one log file per day; no file output when omitted */
  logDirectory?: string

  /** Whether to write to the console (default: true) */
  console?: boolean

  /** Clock used for timestamps and file names */
  now?: () => Date
}

/**
 * Name of the log file written on a given day
 */
export function dailyLogFileName(date: Date): string {
  return `coffee-pairing-${formatDateStamp(date)}.log`
}

/**
 * Formats a single log line: `[yyyy-MM-dd HH:mm:ss] LEVEL: message {context}`
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  date: Date,
  context?: Record<string, unknown>
): string {
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : ''
  return `[${formatLogTimestamp(date)}] ${level.toUpperCase()}: ${message}${suffix}`
}

/**
 * Creates a logger writing to the console and, optionally, to a daily file
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', logDirectory: './logs/' })
 * logger.info('Generated pairs', { count: 4 })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info')
  const writeConsole = options.console ?? true
  const now = options.now ?? (() => new Date())

  if (options.logDirectory) {
    mkdirSync(options.logDirectory, { recursive: true })
  }

  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return
    }

    const date = now()
    const line = formatLogLine(level, message, date, context)

    if (writeConsole) {
      if (level === 'warn' || level === 'error') {
        console.error(line)
      } else {
        console.log(line)
      }
    }

    if (options.logDirectory) {
      appendFileSync(join(options.logDirectory, dailyLogFileName(date)), `${line}\n`, 'utf-8')
    }
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  }
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a component name
 */
export function createPrefixedLogger(
  prefix: string,
  baseLogger: Logger
): Logger {
  const tag = `[${prefix}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${tag} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${tag} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${tag} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${tag} ${message}`, context),
  }
}
