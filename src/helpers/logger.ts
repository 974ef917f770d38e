/**
 * File logger. The terminal belongs to the UI, so lines go to a log file.
 */

import * as fs from 'fs'
import * as path from 'path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogContext = Record<string, string | number | boolean | undefined>

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

export type LogSink = (line: string) => void

/**
 * Sink appending to a file, creating its directory on first use
 */
export function fileSink(filePath: string): LogSink {
  let ready = false
  return (line: string) => {
    try {
      if (!ready) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true })
        ready = true
      }
      fs.appendFileSync(filePath, line + '\n')
    } catch {
      // a failed write drops the line
    }
  }
}

function formatContext(context: LogContext): string {
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`)
  return parts.length > 0 ? ` ${parts.join(' ')}` : ''
}

export class Logger {
  constructor(
    private readonly sink: LogSink,
    private readonly level: LogLevel = 'info',
    private readonly context: LogContext = {}
  ) {}

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(this.sink, this.level, { ...this.context, ...context })
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

  error(message: string, error?: unknown, context?: LogContext): void {
    const detail = error instanceof Error ? `: ${error.name}: ${error.message}` : error !== undefined ? `: ${String(error)}` : ''
    this.write('error', message + detail, context)
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return
    const timestamp = new Date().toISOString()
    const combined = { ...this.context, ...context }
    this.sink(`[${timestamp}] ${level.toUpperCase()} ${message}${formatContext(combined)}`)
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger = new Logger(() => {}, 'error')

export function createLogger(filePath: string, level: LogLevel): Logger {
  return new Logger(fileSink(filePath), level)
}
