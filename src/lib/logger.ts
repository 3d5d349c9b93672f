/**
 * Flowform Logger
 *
 * Structured, level-based logging with persistent context fields.
 * Entries go to stderr as one JSON object per line so stdout stays free for
 * plan and apply output. Replace the sink with setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error'
}

export interface LogEntry {
  level: LogLevel
  message: string
  context?: Record<string, unknown>
  timestamp: string
}

export type LogHandler = (entry: LogEntry) => void

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
  child(context: Record<string, unknown>): Logger
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3
}

const defaultLogHandler: LogHandler = (entry) => {
  console.error(JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context
  }))
}

/**
 * Parse a level name (case-insensitive). Returns null for unknown names.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  switch (value?.trim().toLowerCase()) {
    case 'debug': return LogLevel.Debug
    case 'info': return LogLevel.Info
    case 'warn':
    case 'warning': return LogLevel.Warn
    case 'error': return LogLevel.Error
    default: return null
  }
}

let currentHandler: LogHandler = defaultLogHandler
let currentMinLevel: LogLevel = parseLogLevel(process.env.FLOWFORM_LOG_LEVEL) ?? LogLevel.Warn

/** Replace the log sink. Pass null to restore the stderr handler. */
export function setLogHandler(handler: LogHandler | null): void {
  currentHandler = handler ?? defaultLogHandler
}

/** Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level
}

export function getLogLevel(): LogLevel {
  return currentMinLevel
}

function log(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return
  currentHandler({
    level,
    message,
    context: Object.keys(context).length > 0 ? context : undefined,
    timestamp: new Date().toISOString()
  })
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx })
  }
}

/**
 * Mask a secret for display: keeps the first and last two characters.
 */
export function maskSecret(value: string): string {
  if (value.length <= 8) return '****'
  return `${value.slice(0, 2)}****${value.slice(-2)}`
}

/** Root logger instance */
export const logger = createLogger({ component: 'flowform' })
