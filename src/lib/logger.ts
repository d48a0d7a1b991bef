/**
 * Logging collaborator for decoder observation points.
 *
 * @module pixycam-js/logger
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

/**
 * Structured logger accepted by the decoder, transports and device.
 */
export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void
  info: (message: string, meta?: Record<string, unknown>) => void
  warn: (message: string, meta?: Record<string, unknown>) => void
  error: (message: string, meta?: Record<string, unknown>) => void
}

export interface ConsoleLoggerOptions {
  /** Prefix identifying the instance */
  name?: string
  /** Emit debug lines */
  debug?: boolean
}

/**
 * Formats one log line: `[timestamp] [LEVEL] [name] message {meta}`.
 */
export function formatLogLine (level: LogLevel, name: string | undefined, message: string, meta?: Record<string, unknown>, now: Date = new Date()): string {
  const prefix = name !== undefined ? ` [${name}]` : ''
  const metaStr = meta !== undefined ? ` ${JSON.stringify(meta)}` : ''
  return `[${now.toISOString()}] [${level}]${prefix} ${message}${metaStr}`
}

/**
 * Creates a logger writing to the console.
 */
export function createConsoleLogger (options: ConsoleLoggerOptions = {}): Logger {
  const { name, debug = false } = options
  return {
    debug (message, meta) {
      if (debug) {
        console.log(formatLogLine(LogLevel.DEBUG, name, message, meta))
      }
    },
    info (message, meta) {
      console.log(formatLogLine(LogLevel.INFO, name, message, meta))
    },
    warn (message, meta) {
      console.warn(formatLogLine(LogLevel.WARN, name, message, meta))
    },
    error (message, meta) {
      console.error(formatLogLine(LogLevel.ERROR, name, message, meta))
    }
  }
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug () {},
  info () {},
  warn () {},
  error () {}
}
