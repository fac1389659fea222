/**
 * Check run IDs: `YYYYMMDD-HHMMSS-<16 hex>`, UTC
 */

import { randomBytes } from 'crypto'

const CHECK_ID_PATTERN = /^\d{8}-\d{6}-[0-9a-f]{16}$/

export function generateCheckId(now: Date = new Date()): string {
  const iso = now.toISOString() // 2025-03-12T08:15:42.123Z
  const date = iso.slice(0, 10).replace(/-/g, '')
  const time = iso.slice(11, 19).replace(/:/g, '')
  return `${date}-${time}-${randomBytes(8).toString('hex')}`
}

export function isValidCheckId(id: string): boolean {
  return CHECK_ID_PATTERN.test(id)
}
