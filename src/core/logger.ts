import type { Logger, LogLevel } from './types.js'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[]

type EmitLevel = Exclude<LogLevel, 'silent'>

function emit(level: EmitLevel, event: string, data?: Record<string, unknown>): void {
  const payload = {
    ts: new Date().toISOString(),
    level: level.toUpperCase(),
    event,
    ...(data ?? {})
  }
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload))
}

/** JSON-lines logger that drops events below `threshold`. */
export function createLogger(threshold: LogLevel = 'info'): Logger {
  const floor = LOG_LEVELS.indexOf(threshold)
  const at =
    (level: EmitLevel) =>
    (event: string, data?: Record<string, unknown>): void => {
      if (LOG_LEVELS.indexOf(level) >= floor) emit(level, event, data)
    }

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error')
  }
}
