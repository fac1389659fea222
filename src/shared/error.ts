/**
 * Unified error handling
 * Errors carry a code, a category and an optional fix suggestion.
 */

import chalk from 'chalk'
import { getErrorMessage } from './assertError.js'

export type ErrorCategory =
  | 'CONFIG'
  | 'STORE'
  | 'CHECKS'
  | 'NETWORK'
  | 'NOTIFY'
  | 'QUEUE'
  | 'VALIDATION'
  | 'TIMEOUT'
  | 'UNKNOWN'

export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'ALERT_ALREADY_REGISTERED'
  | 'ALERT_NOT_REGISTERED'
  | 'INSUFFICIENT_HISTORY'
  | 'CHECK_EXECUTION_FAILED'
  | 'TEST_RESULTS_FAILED'
  | 'NOTIFY_FAILED'
  | 'QUEUE_STOPPED'
  | 'ERR_TIMEOUT'
  | 'ERR_VALIDATION'
  | 'UNKNOWN'

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly category: ErrorCategory = 'UNKNOWN',
    public readonly cause?: unknown,
    public readonly suggestion?: string
  ) {
    super(message)
    this.name = 'AppError'
  }

  /** Render for the terminal */
  format(): string {
    const lines: string[] = []
    const colorFn = categoryColors[this.category]

    lines.push('')
    lines.push(chalk.red('✗') + ' ' + chalk.bold('Error') + ` [${colorFn(this.category)}]`)
    lines.push('')
    lines.push(chalk.dim(`  code: ${this.code}`))
    lines.push(`  ${this.message}`)

    if (this.suggestion) {
      lines.push('')
      lines.push(chalk.cyan('  Suggested fix:'))
      lines.push(chalk.dim('    →') + ` ${this.suggestion}`)
    }

    lines.push('')
    return lines.join('\n')
  }

  // ============ Factories ============

  static configInvalid(reason: string): AppError {
    return new AppError(
      'CONFIG_INVALID',
      `Invalid config: ${reason}`,
      'CONFIG',
      undefined,
      'Check .devnet-alerts.yaml against the documented fields'
    )
  }

  static checkExecution(reason: string, cause?: unknown): AppError {
    return new AppError(
      'CHECK_EXECUTION_FAILED',
      `Check execution failed: ${reason}`,
      'CHECKS',
      cause,
      'Run the configured check command by hand to inspect its output'
    )
  }

  static testResults(reason: string, cause?: unknown): AppError {
    return new AppError('TEST_RESULTS_FAILED', `Failed to fetch test results: ${reason}`, 'NETWORK', cause)
  }

  static notifyFailed(reason: string, cause?: unknown): AppError {
    return new AppError('NOTIFY_FAILED', `Notification delivery failed: ${reason}`, 'NOTIFY', cause)
  }

  static insufficientHistory(message: string): InsufficientHistoryError {
    return new InsufficientHistoryError(message)
  }

  static queueStopped(): AppError {
    return new AppError('QUEUE_STOPPED', 'queue stopped', 'QUEUE')
  }

  static timeout(message?: string): AppError {
    return new AppError(
      'ERR_TIMEOUT',
      message || 'Operation timed out',
      'TIMEOUT',
      undefined,
      'Raise queue.timeoutMs in the config'
    )
  }

  static validation(message: string): AppError {
    return new AppError('ERR_VALIDATION', message, 'VALIDATION')
  }

  static unknown(cause: unknown): AppError {
    return new AppError('UNKNOWN', getErrorMessage(cause), 'UNKNOWN', cause)
  }
}

// ============ Store errors ============

export class AlertAlreadyRegisteredError extends AppError {
  constructor(
    public readonly network: string,
    public readonly client: string
  ) {
    super(
      'ALERT_ALREADY_REGISTERED',
      `client ${client} is already registered for network ${network} in this channel`,
      'STORE',
      undefined,
      'Deregister it first: devnet-alerts deregister <network> <client>'
    )
    this.name = 'AlertAlreadyRegisteredError'
  }
}

export class AlertNotRegisteredError extends AppError {
  constructor(
    public readonly network: string,
    public readonly client: string
  ) {
    super('ALERT_NOT_REGISTERED', `client ${client} is not registered for network ${network}`, 'STORE')
    this.name = 'AlertNotRegisteredError'
  }
}

/** Fewer than two stored snapshots; expected on cold start */
export class InsufficientHistoryError extends AppError {
  constructor(message: string) {
    super('INSUFFICIENT_HISTORY', message, 'STORE')
    this.name = 'InsufficientHistoryError'
  }
}

// ============ Output ============

const categoryColors: Record<ErrorCategory, (text: string) => string> = {
  CONFIG: chalk.yellow,
  STORE: chalk.yellow,
  CHECKS: chalk.red,
  NETWORK: chalk.red,
  NOTIFY: chalk.magenta,
  QUEUE: chalk.magenta,
  VALIDATION: chalk.yellow,
  TIMEOUT: chalk.magenta,
  UNKNOWN: chalk.gray,
}

export function printError(error: unknown): void {
  const appError = error instanceof AppError ? error : AppError.unknown(error)
  console.error(appError.format())
}
