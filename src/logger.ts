export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

export const DEV_LOG =
  process.env.NODE_ENV === 'development' ||
  process.env.DEV_LOG === '1' ||
  process.env.DEV_LOG === 'true' ||
  !!process.env.TEST

function threshold(): LogLevel {
  return DEV_LOG ? 'debug' : 'info'
}

export type Logger = Record<LogLevel, (...args: unknown[]) => void>

/**
 * Console logger tagged with a component scope, e.g. `[warn] [pipeline] ...`.
 * Debug output only appears with DEV_LOG set (or in development and test runs).
 */
export function createLogger(scope: string): Logger {
  const emit =
    (level: LogLevel, sink: (...args: unknown[]) => void) =>
    (...args: unknown[]) => {
      if (LEVEL_RANK[level] < LEVEL_RANK[threshold()]) return
      sink(`[${level}]`, `[${scope}]`, ...args)
    }
  return {
    debug: emit('debug', console.debug),
    info: emit('info', console.info),
    warn: emit('warn', console.warn),
    error: emit('error', console.error)
  }
}
