import pino, { type Logger } from 'pino'

export type { Logger }

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug']

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Process logger writing JSON lines to stderr, so stdout stays free for command output
 */
export function createLogger(level: LogLevel = 'warn'): Logger {
  return pino({ name: 'folio', level }, pino.destination(2))
}

export const silentLogger: Logger = pino({ level: 'silent' })
