import pc from 'picocolors'
import { format } from 'node:util'

export type LogLevel = 'silent' | 'critical' | 'error' | 'warn' | 'info' | 'debug'

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  critical: 1,
  error: 2,
  warn: 3,
  info: 4,
  debug: 5,
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  critical: (text) => pc.bold(pc.red(text)),
  error: pc.red,
  warn: pc.yellow,
  info: pc.cyan,
  debug: pc.dim,
}

export interface LoggerOptions {
  level?: LogLevel
  write?: (line: string) => void
}

/**
 * Maps the repeatable `-v` flag onto a log level.
 * No flag keeps only critical messages, `-vvvv` shows everything.
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 4) return 'debug'
  if (verbosity === 3) return 'info'
  if (verbosity === 2) return 'warn'
  if (verbosity === 1) return 'error'
  return 'critical'
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0')
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`
}

export class Logger {
  private level: LogLevel
  private write: (line: string) => void

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'critical'
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`))
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level]
  }

  critical(message: string, ...args: unknown[]): void {
    this.log('critical', message, args)
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args)
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args)
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args)
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args)
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) return

    // Errors keep their stack so unhandled failures are logged with full context
    const rendered = args.map((arg) => (arg instanceof Error ? (arg.stack ?? arg.message) : arg))
    const text = format(message, ...rendered)

    this.write(`${formatTimestamp(new Date())} - ${LEVEL_COLORS[level](text)}`)
  }
}

export const logger = new Logger()
