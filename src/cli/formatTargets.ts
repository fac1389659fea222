import chalk from 'chalk'
import { CronExpressionParser } from 'cron-parser'
import { table } from 'table'
import { formatRelative } from '../shared/formatTime.js'
import type { MonitoredTarget } from '../store/types.js'

export const DEFAULT_SCHEDULE = '0 * * * *'

export const TARGET_TABLE_HEADERS = ['Network', 'Client', 'Type', 'Channel', 'Schedule', 'Next run', 'Last check', 'Updated']

/** Next UTC fire time of a cron expression, null when it does not parse */
export function nextRunAt(schedule: string, currentDate: Date = new Date()): string | null {
  try {
    return CronExpressionParser.parse(schedule, { currentDate, tz: 'UTC' }).next().toISOString()
  } catch {
    return null
  }
}

export function targetRow(target: MonitoredTarget, now: Date = new Date()): string[] {
  return [
    target.network,
    target.client,
    target.clientType === 'consensus' ? 'CL' : 'EL',
    target.channel,
    target.schedule,
    nextRunAt(target.schedule, now) ?? 'invalid',
    target.lastCheckID ?? '-',
    formatRelative(target.updatedAt),
  ]
}

export function renderTargetTable(targets: readonly MonitoredTarget[], now: Date = new Date()): string {
  if (targets.length === 0) return chalk.yellow('No targets registered')

  const headers = TARGET_TABLE_HEADERS.map(h => chalk.bold(h))
  return table([headers, ...targets.map(t => targetRow(t, now))])
}
