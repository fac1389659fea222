/**
 * Unified logging
 *
 * - leveled output (debug/info/warn/error)
 * - foreground (terse) vs background (scoped, for daemons) mode
 * - structured error context via logError
 *
 * Usage:
 * - const logger = createLogger('queue')
 * - setLogLevel('debug')
 */

import chalk from 'chalk'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'
export type LogMode = 'foreground' | 'background'

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
}

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY
}

function initLogLevel(): LogLevel {
  if (process.env.NODE_ENV === 'test') return 'silent'
  if (process.env.SILENT === '1') return 'silent'
  if (process.env.DEBUG === '1') return 'debug'
  const fromEnv = process.env.LOG_LEVEL
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv
  return 'info'
}

function initLogMode(): LogMode {
  if (process.env.DEVNET_ALERTS_BACKGROUND === '1') return 'background'
  return process.stdout.isTTY ? 'foreground' : 'background'
}

let currentLevel: LogLevel = initLogLevel()
const currentMode: LogMode = initLogMode()

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel]
}

function formatTime(): string {
  const now = new Date()
  const pad = (n: number) => n.toString().padStart(2, '0')
  return chalk.dim(`${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`)
}

function formatMessage(
  level: Exclude<LogLevel, 'silent'>,
  scope: string,
  message: string,
  mode: LogMode
): string {
  const color = LEVEL_COLORS[level]
  const label = LEVEL_LABELS[level]

  if (mode === 'foreground') {
    return `${formatTime()} ${color(label)} ${message}`
  }

  const scopeStr = scope ? chalk.cyan(`[${scope}]`) : ''
  return `${formatTime()} ${color(label)} ${scopeStr} ${message}`
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  /** Derive a logger whose scope is `<scope>:<sub>` */
  child(sub: string): Logger
}

export function createLogger(scope: string = ''): Logger {
  function logWithLevel(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (!shouldLog(level)) return

    const output = formatMessage(level, scope, message, currentMode)
    const logFn = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    logFn(output, ...args)
  }

  return {
    debug(message: string, ...args: unknown[]) {
      logWithLevel('debug', message, args)
    },
    info(message: string, ...args: unknown[]) {
      logWithLevel('info', message, args)
    },
    warn(message: string, ...args: unknown[]) {
      logWithLevel('warn', message, args)
    },
    error(message: string, ...args: unknown[]) {
      logWithLevel('error', message, args)
    },
    child(sub: string) {
      return createLogger(scope ? `${scope}:${sub}` : sub)
    },
  }
}

// ============ Error logging ============

/** Context attached to an error line */
export interface ErrorContext {
  network?: string
  client?: string
  checkId?: string
  /** Queue key (`network-client`) */
  key?: string
  [key: string]: unknown
}

/**
 * Log an error with its context and the top of its stack.
 *
 * @example
 * logError(logger, 'Evaluation failed', err, { network: 'devnet-7', client: 'geth' })
 */
export function logError(
  loggerInstance: Logger,
  message: string,
  error: unknown,
  context?: ErrorContext
): void {
  const errorMessage = error instanceof Error ? error.message : String(error)
  const errorStack = error instanceof Error ? error.stack : undefined

  const data: Record<string, unknown> = {}
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined) {
        data[key] = value
      }
    }
  }

  if (errorStack) {
    data.stack = errorStack.split('\n').slice(0, 6).join('\n')
  }

  if (Object.keys(data).length > 0) {
    loggerInstance.error(`${message}: ${errorMessage}`, data)
  } else {
    loggerInstance.error(`${message}: ${errorMessage}`)
  }
}
