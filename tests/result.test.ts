/**
 * Result helpers
 */

import { describe, it, expect } from 'vitest'
import { ok, err, fromPromise, type Result } from '../src/shared/result.js'
import { InsufficientHistoryError } from '../src/shared/error.js'

describe('ok / err', () => {
  it('should build a success result', () => {
    const result = ok(42)
    expect(result).toEqual({ ok: true, value: 42 })
  })

  it('should build a failure result with a custom error type', () => {
    const error = new InsufficientHistoryError('no previous summary results found')
    const result: Result<number, InsufficientHistoryError> = err(error)

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toBe(error)
  })
})

describe('fromPromise', () => {
  it('should wrap a resolved promise', async () => {
    expect(await fromPromise(Promise.resolve([1, 2]))).toEqual({ ok: true, value: [1, 2] })
  })

  it('should wrap a rejection as an Error', async () => {
    const result = await fromPromise(Promise.reject(new Error('boom')))

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('boom')
  })

  it('should turn a non-Error rejection into an Error', async () => {
    const result = await fromPromise(Promise.reject('plain string'))

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error)
      expect(result.error.message).toBe('plain string')
    }
  })
})
