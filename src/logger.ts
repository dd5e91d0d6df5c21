/* eslint-disable no-console */
import pc from 'picocolors'

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

export interface Logger {
  debug: (message: unknown, ...args: unknown[]) => void
  info: (message: unknown, ...args: unknown[]) => void
  warn: (message: unknown, ...args: unknown[]) => void
  error: (message: unknown, ...args: unknown[]) => void
}

export interface LoggerOptions {
  level?: LogLevel
  prefix?: string
  timestamps?: boolean
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
}

/**
 * Creates a levelled logger that writes to stderr, keeping stdout free for
 * machine-readable output such as the JSON result.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const prefix = options.prefix ? `[${options.prefix}]` : ''
  const timestamps = options.timestamps ?? true

  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] <= LEVEL_ORDER[level]

  const format = (tag: string, message: unknown): string => {
    const parts = [timestamps ? pc.dim(new Date().toISOString()) : '', tag, prefix, String(message)]
    return parts.filter(Boolean).join(' ')
  }

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.error(format(pc.gray('DEBUG'), message), ...args)
    },
    info: (message, ...args) => {
      if (enabled('info')) console.error(format(pc.cyan('INFO '), message), ...args)
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.error(format(pc.yellow('WARN '), message), ...args)
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(format(pc.red('ERROR'), message), ...args)
    },
  }
}

/**
 * Shared logger for CLI glue. Library code receives its logger through
 * constructor options instead of reaching for this one.
 */
export const logger: Logger = createLogger({ level: process.env.CAPTURE_LOG_LEVEL === 'debug' ? 'debug' : 'info' })

/**
 * Masks all but the first and last character of a secret so it can appear in logs
 */
export function maskSecret(secret: string): string {
  if (secret.length === 0) return '(empty)'
  if (secret.length <= 2) return '*'.repeat(secret.length)
  return `${secret[0]}${'*'.repeat(secret.length - 2)}${secret[secret.length - 1]}`
}
