export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none'

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
}

export interface Logger {
  readonly level: LogLevel
  setLevel(level: LogLevel): void
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

function formatArgs(args: unknown[]): string {
  if (args.length === 0) return ''
  return (
    ' ' +
    args
      .map(arg => {
        if (typeof arg === 'string') return arg
        if (arg instanceof Error) return `${arg.name}: ${arg.message}`
        try {
          return JSON.stringify(arg)
        } catch {
          return String(arg)
        }
      })
      .join(' ')
  )
}

/**
 * Writes through `console`, dropping messages below the configured level.
 */
export class ConsoleLogger implements Logger {
  private currentLevel: LogLevel
  private readonly prefix: string

  constructor(prefix = '', level: LogLevel = 'info') {
    this.prefix = prefix ? `[${prefix}] ` : ''
    this.currentLevel = level
  }

  get level(): LogLevel {
    return this.currentLevel
  }

  setLevel(level: LogLevel): void {
    this.currentLevel = level
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.currentLevel]
  }

  private format(level: LogLevel, message: string, args: unknown[]): string {
    return `${this.prefix}${level.toUpperCase()} ${message}${formatArgs(args)}`
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, args))
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, args))
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, args))
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, args))
    }
  }
}

// Default for the library: a ConsoleLogger that never writes.
export const silentLogger: Logger = new ConsoleLogger('depgraph', 'none')
