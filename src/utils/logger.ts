export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_RANK
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  const normalized = value?.trim().toLowerCase()
  return isLogLevel(normalized) ? normalized : fallback
}

let currentLevel: LogLevel = parseLogLevel(process.env.FIXLOG_LOG_LEVEL)

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel]
}

// Everything goes to stderr: stdout carries decoded output only
export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.error(`[fixlog] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    if (enabled('info')) console.error(`[fixlog] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(`[fixlog] ${message}`, ...args)
  },
  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(`[fixlog] ${message}`, ...args)
  },
}
