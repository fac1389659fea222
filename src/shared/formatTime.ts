/**
 * Date helpers shared by the stores and the CLI
 */

import { formatDistanceToNow, isValid, parseISO } from 'date-fns'

/** UTC calendar date, `YYYY-MM-DD` */
export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10)
}

/** Parse a `YYYY-MM-DD` key; null when it is not a real date */
export function parseDateKey(key: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(key)) return null
  const parsed = parseISO(key)
  return isValid(parsed) ? parsed : null
}

/** "3 minutes ago" style, for list output */
export function formatRelative(iso: string | undefined): string {
  if (!iso) return '-'
  const parsed = parseISO(iso)
  if (!isValid(parsed)) return '-'
  return formatDistanceToNow(parsed, { addSuffix: true })
}
