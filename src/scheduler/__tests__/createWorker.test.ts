import { describe, it, expect, vi } from 'vitest'
import { createWorker, type WorkerContext } from '../worker.js'

describe('createWorker', () => {
  it('should move from idle to running on start()', () => {
    const worker = createWorker({ name: 'test-worker' }, async () => 'ok')
    expect(worker.status()).toBe('idle')

    worker.start()
    worker.start()
    expect(worker.status()).toBe('running')
  })

  it('should return the handler value as Result.ok', async () => {
    const handler = vi.fn(async (ctx: WorkerContext<string>) => `processed: ${ctx.task}`)
    const worker = createWorker({ name: 'test-worker' }, handler)
    worker.start()

    const result = await worker.execute('hello')

    expect(result).toEqual({ ok: true, value: 'processed: hello' })
    expect(worker.runningCount()).toBe(0)
  })

  it('should turn a thrown error into Result.err', async () => {
    const worker = createWorker({ name: 'test-worker' }, async () => {
      throw new Error('task failed')
    })
    worker.start()

    const result = await worker.execute('data')

    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('task failed')
  })

  it('should abort the signal and fail on timeout', async () => {
    const seen: { signal?: AbortSignal } = {}
    const worker = createWorker({ name: 'test-worker', timeout: 20 }, ctx => {
      seen.signal = ctx.signal
      return new Promise<string>((_resolve, reject) => {
        ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason), { once: true })
      })
    })
    worker.start()

    const result = await worker.execute('slow')

    expect(seen.signal?.aborted).toBe(true)
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('evaluation timed out after 20ms')
  })

  it('should count a timed-out task as running until its handler settles', async () => {
    const gate: { finish?: (value: string) => void } = {}
    const onSettled = vi.fn()
    const worker = createWorker(
      { name: 'test-worker', timeout: 20, onSettled },
      () =>
        new Promise<string>(resolve => {
          gate.finish = resolve
        })
    )
    worker.start()

    const result = await worker.execute('stubborn')

    expect(result.ok).toBe(false)
    expect(worker.runningCount()).toBe(1)
    expect(onSettled).not.toHaveBeenCalled()

    gate.finish?.('late')
    await vi.waitFor(() => expect(worker.runningCount()).toBe(0))
    expect(onSettled).toHaveBeenCalledTimes(1)
    expect(onSettled).toHaveBeenCalledWith('stubborn')
  })

  it('should abort running tasks on stop()', async () => {
    const started = vi.fn()
    const worker = createWorker({ name: 'test-worker' }, ctx => {
      started()
      return new Promise<string>((_resolve, reject) => {
        ctx.signal.addEventListener('abort', () => reject(ctx.signal.reason), { once: true })
      })
    })
    worker.start()

    const pending = worker.execute('forever')
    await vi.waitFor(() => expect(started).toHaveBeenCalled())
    await worker.stop()

    const result = await pending
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('queue stopped')
    expect(worker.status()).toBe('stopped')
    expect(worker.runningCount()).toBe(0)
  })

  it('should not finish stop() while a handler ignores its signal', async () => {
    const gate: { finish?: (value: string) => void } = {}
    const worker = createWorker(
      { name: 'test-worker' },
      () =>
        new Promise<string>(resolve => {
          gate.finish = resolve
        })
    )
    worker.start()

    const pending = worker.execute('stubborn')
    await vi.waitFor(() => expect(gate.finish).toBeDefined())

    let stopped = false
    const stopping = worker.stop().then(() => {
      stopped = true
    })
    const result = await pending
    if (!result.ok) expect(result.error.message).toBe('queue stopped')
    expect(stopped).toBe(false)
    expect(worker.runningCount()).toBe(1)

    gate.finish?.('late')
    await stopping
    expect(worker.runningCount()).toBe(0)
  })

  it('should let running tasks finish on a graceful stop', async () => {
    const gate: { finish?: (value: string) => void } = {}
    const worker = createWorker(
      { name: 'test-worker' },
      () =>
        new Promise<string>(resolve => {
          gate.finish = resolve
        })
    )
    worker.start()

    const pending = worker.execute('task')
    await vi.waitFor(() => expect(gate.finish).toBeDefined())
    expect(worker.runningCount()).toBe(1)
    const stopping = worker.stop({ graceful: true })
    gate.finish?.('done')
    await stopping

    expect(await pending).toEqual({ ok: true, value: 'done' })
  })

  it('should refuse work once stopped', async () => {
    const onSettled = vi.fn()
    const worker = createWorker({ name: 'test-worker', onSettled }, async () => 'ok')
    worker.start()
    await worker.stop()

    const result = await worker.execute('late')
    expect(result.ok).toBe(false)
    expect(onSettled).toHaveBeenCalledWith('late')
  })
})
