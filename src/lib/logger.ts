/**
 * Levelled console logger. Level comes from VITE_LOG_LEVEL (see config.ts).
 */

import { LOG_LEVEL, type LogLevelName } from '../config'

const LEVEL_ORDER: Record<LogLevelName, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export type LogContext = Record<string, unknown>

export class Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevelName = LOG_LEVEL
  ) {}

  private shouldLog(level: LogLevelName): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  private format(level: LogLevelName, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString()
    const contextStr = context ? ` ${JSON.stringify(context)}` : ''
    return `[${timestamp}] [${level.toUpperCase()}] [${this.scope}] ${message}${contextStr}`
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) console.debug(this.format('debug', message, context))
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) console.info(this.format('info', message, context))
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) console.warn(this.format('warn', message, context))
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.shouldLog('error')) return
    const errorContext: LogContext = {
      ...context,
      error: error instanceof Error ? { name: error.name, message: error.message, stack: error.stack } : String(error),
    }
    console.error(this.format('error', message, errorContext))
  }
}

export function createLogger(scope: string, level?: LogLevelName): Logger {
  return new Logger(scope, level)
}
