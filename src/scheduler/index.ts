/**
 * @entry Scheduler
 *
 * Evaluation queue, worker, event bus and cron triggers
 */

export {
  type EventHandler,
  type EventBus,
  type EvaluationEvents,
  createEventBus,
  eventBus,
} from './eventBus.js'

export {
  type EvaluationRequest,
  type EvaluationReport,
  type EvaluationOutcome,
  type EvaluationContext,
  type EvaluationHandler,
  type EvaluationQueue,
  type EvaluationQueueConfig,
  type EnqueueResult,
  type KeyState,
  type QueueMetrics,
  type RejectReason,
  createEvaluationQueue,
  evaluationKey,
} from './queue.js'

export { type Worker, type WorkerContext, type TaskHandler, createWorker } from './worker.js'

export { registerMonitorJobs, stopMonitorJobs, triggerEvaluation } from './monitorJobs.js'
