/**
 * Worker
 * Runs one task at a time per call, with a timeout and cancellation.
 */

import { type Result, err, fromPromise } from '../shared/result.js'
import { AppError } from '../shared/error.js'
import { ensureError } from '../shared/assertError.js'
import { createLogger, logError, type Logger } from '../shared/logger.js'

export type WorkerStatus = 'idle' | 'running' | 'stopped'

export interface WorkerConfig<T = unknown> {
  name: string
  /** Per-task timeout (ms); the task's signal is aborted when it expires */
  timeout?: number
  /** Called once per task when its handler has settled, or when a stopped worker refuses it */
  onSettled?: (task: T) => void
}

export interface Worker<T, R> {
  start(): void
  /**
   * Stop taking tasks. In-flight tasks are aborted unless `graceful` is set.
   * Resolves once every handler has settled.
   */
  stop(options?: { graceful?: boolean }): Promise<void>
  execute(task: T): Promise<Result<R, Error>>
  status(): WorkerStatus
  runningCount(): number
}

export interface WorkerContext<T> {
  task: T
  logger: Logger
  signal: AbortSignal
}

export type TaskHandler<T, R> = (ctx: WorkerContext<T>) => Promise<R>

// settles with the abort reason once the signal fires
function whenAborted(signal: AbortSignal): Promise<Result<never, Error>> {
  return new Promise(resolve => {
    const onAbort = () => resolve(err(ensureError(signal.reason)))
    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }
  })
}

export function createWorker<T, R>(config: WorkerConfig<T>, handler: TaskHandler<T, R>): Worker<T, R> {
  const logger = createLogger(config.name)
  const { timeout = 300_000 } = config

  let currentStatus: WorkerStatus = 'idle'
  let runningTasks = 0
  const abortControllers = new Set<AbortController>()

  function settled(task: T): void {
    try {
      config.onSettled?.(task)
    } catch (error) {
      logError(logger, 'onSettled hook failed', error)
    }
  }

  async function run(task: T): Promise<Result<R, Error>> {
    const controller = new AbortController()
    abortControllers.add(controller)
    runningTasks++

    const timeoutId = setTimeout(
      () => controller.abort(AppError.timeout(`evaluation timed out after ${timeout}ms`)),
      timeout
    )

    const ctx: WorkerContext<T> = { task, logger, signal: controller.signal }

    // the task counts as running until its handler settles, even after an abort
    const handled = fromPromise(Promise.resolve().then(() => handler(ctx))).then(result => {
      clearTimeout(timeoutId)
      abortControllers.delete(controller)
      runningTasks--
      settled(task)
      return result
    })

    // an aborted task reports early; a handler that ignores its signal keeps its slot
    return Promise.race([handled, whenAborted(controller.signal)])
  }

  return {
    start(): void {
      if (currentStatus === 'running') return
      currentStatus = 'running'
      logger.debug('Worker started')
    },

    async stop(options = {}): Promise<void> {
      currentStatus = 'stopped'

      if (!options.graceful) {
        for (const controller of abortControllers) {
          controller.abort(AppError.queueStopped())
        }
      }

      while (runningTasks > 0) {
        await new Promise(resolve => setTimeout(resolve, 20))
      }

      logger.debug('Worker stopped')
    },

    async execute(task: T): Promise<Result<R, Error>> {
      if (currentStatus === 'stopped') {
        settled(task)
        return err(AppError.queueStopped())
      }
      return run(task)
    },

    status(): WorkerStatus {
      return currentStatus
    },

    runningCount(): number {
      return runningTasks
    },
  }
}
