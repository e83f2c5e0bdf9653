import pc from 'picocolors'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!value) return fallback
  const normalized = value.trim().toLowerCase()
  return isLogLevel(normalized) ? normalized : fallback
}

/**
 * Levelled logger that writes to stderr so stdout stays reserved for reports
 */
export class Logger {
  private level: LogLevel

  constructor(level: LogLevel = 'info') {
    this.level = level
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', pc.gray('[debug]'), message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', pc.cyan('[info]'), message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', pc.yellow('[warn]'), message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', pc.red('[error]'), message, args)
  }

  private write(level: Exclude<LogLevel, 'silent'>, tag: string, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return
    // eslint-disable-next-line no-console
    console.error(tag, message, ...args)
  }
}

export const logger = new Logger(parseLogLevel(process.env.NETCHECK_LOG_LEVEL))
