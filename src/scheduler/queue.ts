/**
 * Evaluation queue
 *
 * - at most one evaluation per `network-client` key, queued or running
 * - bounded concurrency, FIFO waiting list with a fixed capacity
 * - exactly one outcome per accepted request, on every exit path
 */

import type { ClientType } from '../clients/catalog.js'
import type { Decision } from '../notify/types.js'
import { generateCheckId } from '../shared/generateId.js'
import { createLogger, logError, type Logger } from '../shared/logger.js'
import { eventBus as defaultEventBus, type EvaluationEvents, type EventBus } from './eventBus.js'
import { createWorker } from './worker.js'

export interface EvaluationRequest {
  network: string
  client: string
  clientType: ClientType
  channel: string
}

/** What a handler reports for a finished evaluation */
export interface EvaluationReport {
  notificationSent: boolean
  decision?: Decision
}

export interface EvaluationOutcome extends EvaluationReport {
  id: string
  key: string
  error?: string
}

export interface EvaluationContext {
  /** Also used as the check ID */
  id: string
  key: string
  signal: AbortSignal
  logger: Logger
}

export type EvaluationHandler = (request: EvaluationRequest, ctx: EvaluationContext) => Promise<EvaluationReport>

export type RejectReason = 'already-running' | 'queue-full' | 'stopped'

export type EnqueueResult =
  | { accepted: true; id: string; key: string; outcome: Promise<EvaluationOutcome> }
  | { accepted: false; key: string; reason: RejectReason }

/** Absent keys are idle */
export type KeyState = 'idle' | 'queued' | 'running'

export interface QueueMetrics {
  enqueued: number
  rejected: number
  skippedDueToLock: number
  queueFull: number
  stopped: number
  started: number
  succeeded: number
  failed: number
  inFlight: number
  queueLength: number
  totalProcessingMs: number
  lastProcessingMs: number
}

export interface EvaluationQueueConfig {
  concurrency: number
  capacity: number
  /** Per-evaluation timeout (ms) */
  timeoutMs: number
}

export interface EvaluationQueue {
  enqueue(request: EvaluationRequest): EnqueueResult
  start(): void
  /** Waiting requests get a `queue stopped` outcome; in-flight ones are aborted unless `graceful` */
  stop(options?: { graceful?: boolean }): Promise<void>
  keyState(key: string): KeyState
  metrics(): QueueMetrics
}

export interface EvaluationQueueOptions {
  events?: EventBus<EvaluationEvents>
  logger?: Logger
}

interface PendingItem {
  id: string
  key: string
  request: EvaluationRequest
  resolve: (outcome: EvaluationOutcome) => void
}

export function evaluationKey(request: Pick<EvaluationRequest, 'network' | 'client'>): string {
  return `${request.network}-${request.client}`
}

const QUEUE_STOPPED = 'queue stopped'

export function createEvaluationQueue(
  config: EvaluationQueueConfig,
  handler: EvaluationHandler,
  options: EvaluationQueueOptions = {}
): EvaluationQueue {
  const logger = options.logger ?? createLogger('queue')
  const events = options.events ?? defaultEventBus

  let state: 'created' | 'running' | 'stopped' = 'created'
  const keys = new Map<string, Exclude<KeyState, 'idle'>>()
  const waiting: PendingItem[] = []
  let inFlight = 0

  const counters = {
    enqueued: 0,
    skippedDueToLock: 0,
    queueFull: 0,
    stopped: 0,
    started: 0,
    succeeded: 0,
    failed: 0,
    totalProcessingMs: 0,
    lastProcessingMs: 0,
  }

  // the key stays running until the handler settles, even after a timeout has been reported
  const worker = createWorker<PendingItem, EvaluationReport>(
    {
      name: 'evaluation-worker',
      timeout: config.timeoutMs,
      onSettled: item => {
        inFlight--
        keys.delete(item.key)
        pump()
      },
    },
    ({ task, signal }) =>
      handler(task.request, { id: task.id, key: task.key, signal, logger: logger.child(task.key) })
  )

  function reject(key: string, reason: RejectReason): EnqueueResult {
    if (reason === 'already-running') counters.skippedDueToLock++
    else if (reason === 'queue-full') counters.queueFull++
    else counters.stopped++

    logger.debug(`Rejected ${key}: ${reason}`)
    events.emit('evaluation:rejected', { key, reason }).catch((e: unknown) => logError(logger, 'Event dispatch failed', e))
    return { accepted: false, key, reason }
  }

  async function settle(item: PendingItem, outcome: EvaluationOutcome): Promise<void> {
    item.resolve(outcome)
    await events.emit('evaluation:completed', outcome)
  }

  async function run(item: PendingItem): Promise<void> {
    inFlight++
    counters.started++
    keys.set(item.key, 'running')
    const startedAt = Date.now()

    events
      .emit('evaluation:started', { id: item.id, key: item.key })
      .catch((e: unknown) => logError(logger, 'Event dispatch failed', e))
    const result = await worker.execute(item)

    const elapsed = Date.now() - startedAt
    counters.totalProcessingMs += elapsed
    counters.lastProcessingMs = elapsed

    let outcome: EvaluationOutcome
    if (result.ok) {
      counters.succeeded++
      outcome = { id: item.id, key: item.key, ...result.value }
    } else {
      counters.failed++
      logError(logger, 'Evaluation failed', result.error, { key: item.key, checkId: item.id })
      outcome = { id: item.id, key: item.key, notificationSent: false, error: result.error.message }
    }

    await settle(item, outcome)
  }

  function pump(): void {
    while (state === 'running' && inFlight < config.concurrency) {
      const item = waiting.shift()
      if (!item) return

      run(item).catch((error: unknown) => {
        logError(logger, 'Evaluation bookkeeping failed', error, { key: item.key })
      })
    }
  }

  return {
    enqueue(request: EvaluationRequest): EnqueueResult {
      const key = evaluationKey(request)

      if (state === 'stopped') return reject(key, 'stopped')
      if (keys.has(key)) return reject(key, 'already-running')
      if (waiting.length >= config.capacity) return reject(key, 'queue-full')

      const id = generateCheckId()
      let resolve: (outcome: EvaluationOutcome) => void = () => {}
      const outcome = new Promise<EvaluationOutcome>(r => {
        resolve = r
      })

      waiting.push({ id, key, request, resolve })
      keys.set(key, 'queued')
      counters.enqueued++
      events.emit('evaluation:queued', { id, key }).catch((e: unknown) => logError(logger, 'Event dispatch failed', e))

      pump()
      return { accepted: true, id, key, outcome }
    },

    start(): void {
      if (state !== 'created') return
      state = 'running'
      worker.start()
      logger.info(`Queue started (concurrency ${config.concurrency}, capacity ${config.capacity})`)
      pump()
    },

    async stop(options = {}): Promise<void> {
      if (state === 'stopped') return
      state = 'stopped'

      const dropped = waiting.splice(0, waiting.length)
      for (const item of dropped) {
        keys.delete(item.key)
        await settle(item, { id: item.id, key: item.key, notificationSent: false, error: QUEUE_STOPPED })
      }

      await worker.stop({ graceful: options.graceful })
      logger.info(`Queue stopped (${dropped.length} waiting dropped)`)
    },

    keyState(key: string): KeyState {
      return keys.get(key) ?? 'idle'
    },

    metrics(): QueueMetrics {
      return {
        ...counters,
        rejected: counters.skippedDueToLock + counters.queueFull + counters.stopped,
        inFlight,
        queueLength: waiting.length,
      }
    },
  }
}
