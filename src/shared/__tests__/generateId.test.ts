import { describe, it, expect } from 'vitest'
import { generateCheckId, isValidCheckId } from '../generateId.js'

describe('generateCheckId', () => {
  it('should prefix the UTC date and time', () => {
    const id = generateCheckId(new Date('2026-01-02T03:04:05.678Z'))
    expect(id.startsWith('20260102-030405-')).toBe(true)
    expect(isValidCheckId(id)).toBe(true)
  })

  it('should not repeat within the same second', () => {
    const now = new Date('2026-01-02T03:04:05.000Z')
    expect(generateCheckId(now)).not.toBe(generateCheckId(now))
  })
})

describe('isValidCheckId', () => {
  it('should reject other shapes', () => {
    expect(isValidCheckId('20260102-030405')).toBe(false)
    expect(isValidCheckId('20260102-030405-0123456789ABCDEF')).toBe(false)
  })
})
