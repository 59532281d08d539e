/**
 * logger.ts
 *
 * Level-filtered console logger used by every engine module.
 *
 * Usage:
 *   import { logger } from './logger'
 *   logger.debug('[QueryCache]', 'Registered query', key)
 *   logger.warn('[Mutation]', 'Queued offline', mutationKey)
 *
 * Levels, most to least verbose: debug, info, warn, error, silent.
 * The default is 'warn'; QueryClient({ logLevel }) or logger.setLevel()
 * change it at runtime.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

/** Where formatted entries go. Swapped out in tests. */
export interface LogSink {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

export class Logger {
  #level: LogLevel
  #sink: LogSink

  constructor(level: LogLevel = 'warn', sink: LogSink = console) {
    this.#level = level
    this.#sink = sink
  }

  getLevel(): LogLevel {
    return this.#level
  }

  setLevel(level: LogLevel): void {
    this.#level = level
  }

  setSink(sink: LogSink): void {
    this.#sink = sink
  }

  /**
   * Get timestamp in HH:MM:SS.mmm format
   */
  #getTimestamp(): string {
    const now = new Date()
    const hours = now.getHours().toString().padStart(2, '0')
    const minutes = now.getMinutes().toString().padStart(2, '0')
    const seconds = now.getSeconds().toString().padStart(2, '0')
    const milliseconds = now.getMilliseconds().toString().padStart(3, '0')
    return `${hours}:${minutes}:${seconds}.${milliseconds}`
  }

  #formatMessage(level: Exclude<LogLevel, 'silent'>, args: unknown[]): unknown[] {
    const levelUpper = level.toUpperCase().padEnd(5, ' ')
    return [`[${this.#getTimestamp()}] ${levelUpper}`, ...args]
  }

  #shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.#level]
  }

  /** Detailed engine tracing: registrations, dedup hits, retries. */
  debug(...args: unknown[]): void {
    if (this.#shouldLog('debug')) {
      this.#sink.debug(...this.#formatMessage('debug', args))
    }
  }

  info(...args: unknown[]): void {
    if (this.#shouldLog('info')) {
      this.#sink.info(...this.#formatMessage('info', args))
    }
  }

  /** Recoverable problems: failed prefetch, missing codec, dropped job. */
  warn(...args: unknown[]): void {
    if (this.#shouldLog('warn')) {
      this.#sink.warn(...this.#formatMessage('warn', args))
    }
  }

  error(...args: unknown[]): void {
    if (this.#shouldLog('error')) {
      this.#sink.error(...this.#formatMessage('error', args))
    }
  }
}

// Export singleton instance
export const logger = new Logger()
