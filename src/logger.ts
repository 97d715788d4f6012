/**
 * Pino logger factory.
 *
 * Every store gets one logger; coordinators log through children bound to
 * their component name. No transport is configured, so nothing runs outside
 * the calling thread.
 */

import { pino, type Level, type Logger } from 'pino'

export type { Logger } from 'pino'

export type LogLevel = Level | 'silent'

export interface LoggerConfig {
  /** Defaults to `LODESTORE_LOG_LEVEL`, then `silent` under tests, then `info`. */
  level?: LogLevel
  name?: string
  /** Bindings included in every line. */
  base?: Record<string, unknown>
}

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value)
}

export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.LODESTORE_LOG_LEVEL
  if (configured && isLogLevel(configured)) return configured
  return env.NODE_ENV === 'test' ? 'silent' : 'info'
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return pino({
    name: config.name ?? 'lodestore',
    level: config.level ?? defaultLogLevel(),
    base: config.base ?? null
  })
}
