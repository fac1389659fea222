import { describe, it, expect, vi, afterEach } from 'vitest'
import { registerMonitorJobs, stopMonitorJobs, triggerEvaluation } from '../monitorJobs.js'
import { createEvaluationQueue, type EvaluationHandler } from '../queue.js'
import type { MonitoredTarget } from '../../store/types.js'

function target(overrides: Partial<MonitoredTarget> = {}): MonitoredTarget {
  return {
    network: 'devnet-7',
    client: 'teku',
    clientType: 'consensus',
    channel: 'alerts',
    schedule: '*/5 * * * *',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

describe('monitor jobs', () => {
  const queue = createEvaluationQueue({ concurrency: 1, capacity: 10, timeoutMs: 1000 }, async () => ({
    notificationSent: false,
  }))

  afterEach(() => {
    stopMonitorJobs()
  })

  it('should schedule valid expressions and skip invalid ones', () => {
    const count = registerMonitorJobs(
      [target(), target({ client: 'geth', clientType: 'execution', schedule: 'every minute' })],
      queue
    )
    expect(count).toBe(1)
  })

  it('should enqueue the target on trigger', async () => {
    const handler = vi.fn<EvaluationHandler>(async () => ({ notificationSent: true }))
    const q = createEvaluationQueue({ concurrency: 1, capacity: 10, timeoutMs: 1000 }, handler)
    q.start()

    await triggerEvaluation(target(), q)

    expect(handler).toHaveBeenCalledWith(
      { network: 'devnet-7', client: 'teku', clientType: 'consensus', channel: 'alerts' },
      expect.objectContaining({ key: 'devnet-7-teku' })
    )
    await q.stop()
  })
})
