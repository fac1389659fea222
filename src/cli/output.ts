/**
 * CLI user output
 * Short, friendly terminal feedback without timestamps.
 *
 * Only for command feedback; diagnostic logs go through shared/logger.ts.
 */

import chalk from 'chalk'

// ============ Basic ============

export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

// ============ Structure ============

export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

export function blank(): void {
  console.log()
}

// ============ Lists ============

export interface ListItem {
  label: string
  value: string | number | undefined
  dim?: boolean
}

/** Aligned `label: value` lines */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const maxLabelLen = Math.max(...items.map(i => i.label.length))

  for (const item of items) {
    const label = chalk.gray(item.label.padEnd(maxLabelLen) + ':')
    const value = item.value ?? '-'
    const valueStr = item.dim ? chalk.dim(value) : String(value)
    console.log(`${prefix}${label} ${valueStr}`)
  }
}

export function bulletList(items: string[], bullet = '•', indent = 2): void {
  const prefix = ' '.repeat(indent)
  for (const item of items) {
    console.log(`${prefix}${chalk.dim(bullet)} ${item}`)
  }
}
