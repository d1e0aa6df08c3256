import { resolveRuntimeConfig } from './config'
import type { LogLevel, RuntimeConfig } from './config'

type LogMethod = (message: string, details?: Record<string, unknown>) => void

export type Logger = {
  scope: string
  debug: LogMethod
  info: LogMethod
  warn: LogMethod
  error: LogMethod
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export const createLogger = (
  scope: string,
  config: RuntimeConfig = resolveRuntimeConfig(),
  sink: LogSink = console,
): Logger => {
  const threshold = LEVEL_ORDER[config.logLevel]
  const enabled = (level: Exclude<LogLevel, 'silent'>) => {
    if (level === 'debug' && !config.debug) return false
    return LEVEL_ORDER[level] >= threshold
  }
  const emit =
    (level: Exclude<LogLevel, 'silent'>): LogMethod =>
    (message, details) => {
      if (!enabled(level)) return
      const line = `[${scope}] ${message}`
      if (details) {
        sink[level](line, details)
      } else {
        sink[level](line)
      }
    }

  return {
    scope,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  }
}
