export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

const PREFIX = '[Pantry Planner]'

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

let threshold: LogLevel = 'warn'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return SEVERITY[level] >= SEVERITY[threshold]
}

export const logger = {
  debug(message: string, ...details: unknown[]): void {
    if (enabled('debug')) console.debug(`${PREFIX} ${message}`, ...details)
  },
  info(message: string, ...details: unknown[]): void {
    if (enabled('info')) console.info(`${PREFIX} ${message}`, ...details)
  },
  warn(message: string, ...details: unknown[]): void {
    if (enabled('warn')) console.warn(`${PREFIX} ${message}`, ...details)
  },
  error(message: string, ...details: unknown[]): void {
    if (enabled('error')) console.error(`${PREFIX} ${message}`, ...details)
  },
}
