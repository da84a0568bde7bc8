/**
 * Minimal structured logger.
 * One JSON object per line; debug/info go to stdout, warn/error to stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LogContext = Record<string, unknown>

interface LogEntry {
  readonly level: LogLevel
  readonly msg: string
  readonly time: string
  readonly [key: string]: unknown
}

export interface Logger {
  debug(msg: string, ctx?: LogContext): void
  info(msg: string, ctx?: LogContext): void
  warn(msg: string, ctx?: LogContext): void
  error(msg: string, ctx?: LogContext): void
}

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value)
}

let currentLevel: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function writeLog(level: LogLevel, msg: string, ctx?: LogContext): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return

  const entry: LogEntry = {
    level,
    msg,
    time: new Date().toISOString(),
    ...ctx,
  }
  const out = JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value,
  )
  if (level === 'error' || level === 'warn') {
    process.stderr.write(out + '\n')
  } else {
    process.stdout.write(out + '\n')
  }
}

function withBindings(bindings: LogContext): Logger {
  return {
    debug(msg, ctx) {
      writeLog('debug', msg, { ...bindings, ...ctx })
    },
    info(msg, ctx) {
      writeLog('info', msg, { ...bindings, ...ctx })
    },
    warn(msg, ctx) {
      writeLog('warn', msg, { ...bindings, ...ctx })
    },
    error(msg, ctx) {
      writeLog('error', msg, { ...bindings, ...ctx })
    },
  }
}

export const logger: Logger = withBindings({})

/** Logger that stamps `component` on every entry. */
export function childLogger(component: string): Logger {
  return withBindings({ component })
}
