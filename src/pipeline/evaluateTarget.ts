/**
 * Evaluation pipeline
 *
 * Worker body for one queued evaluation: checks, regressions, classification,
 * decision, delivery, then the registration's bookkeeping.
 */

import { runChecks, type CheckExecutor } from '../checks/runChecks.js'
import type { InstanceClassifier } from '../classifier/classifyInstance.js'
import { decideNotification, type LinkOptions } from '../notify/decideNotification.js'
import type { NotificationSink } from '../notify/types.js'
import { buildSummary } from '../regression/buildSummary.js'
import { detectRegressions } from '../regression/detectRegressions.js'
import type { TestResultSource } from '../regression/testResultSource.js'
import type { RegressionMap, TestResult } from '../regression/types.js'
import type { EvaluationContext, EvaluationHandler, EvaluationReport, EvaluationRequest } from '../scheduler/queue.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger, logError, type Logger } from '../shared/logger.js'
import type { RegistrationStore } from '../store/RegistrationStore.js'
import type { SnapshotStore } from '../store/SnapshotStore.js'

export interface PipelineDeps {
  executor: CheckExecutor
  classifier: InstanceClassifier
  registrations: RegistrationStore
  sink: NotificationSink
  /** Regression detection is skipped unless both are set */
  snapshots?: SnapshotStore
  testResults?: TestResultSource
  links?: LinkOptions
  sshUser?: string
  now?: () => Date
}

/**
 * Fetch the current test results, diff them against the previous snapshot
 * and store them as the new one. Fetch failures mean no regressions.
 */
export async function collectRegressions(
  network: string,
  source: TestResultSource,
  snapshots: SnapshotStore,
  options: { signal?: AbortSignal; logger?: Logger } = {}
): Promise<RegressionMap> {
  const logger = options.logger ?? createLogger('regressions')

  let results: TestResult[]
  try {
    results = await source.fetch(network, options.signal)
  } catch (e) {
    // a cancelled evaluation is not an unavailable source
    if (options.signal?.aborted) throw e
    logger.warn(`Test results unavailable for ${network}: ${getErrorMessage(e)}`)
    return {}
  }

  const current = buildSummary(network, results)
  if (!current) {
    logger.debug(`No test results for ${network}`)
    return {}
  }

  // read before the write below replaces today's snapshot
  const previous = snapshots.getPrevious(network)
  let regressions: RegressionMap = {}
  if (!previous.ok) {
    logger.info(`No regression baseline for ${network}: ${previous.error.message}`)
  } else if (previous.value.summary.timestamp === current.timestamp) {
    logger.debug(`Snapshot for ${network} unchanged since ${current.timestamp}`)
  } else {
    regressions = detectRegressions(current, previous.value.summary, {
      current: results,
      previous: previous.value.results,
    })
  }

  snapshots.storeResult(current, results)
  return regressions
}

export async function evaluateTarget(
  request: EvaluationRequest,
  ctx: EvaluationContext,
  deps: PipelineDeps
): Promise<EvaluationReport> {
  const { network, client, clientType, channel } = request
  const logger = ctx.logger
  const now = deps.now ?? (() => new Date())

  const { results, analysis } = await runChecks(
    deps.executor,
    { network, client, clientType },
    { signal: ctx.signal, logger: logger.child('checks') }
  )
  ctx.signal.throwIfAborted()

  const regressions =
    deps.testResults && deps.snapshots
      ? await collectRegressions(network, deps.testResults, deps.snapshots, {
          signal: ctx.signal,
          logger: logger.child('regressions'),
        })
      : {}
  ctx.signal.throwIfAborted()

  const decision = await decideNotification({
    target: { network, client, clientType, channel },
    analysis,
    results,
    regressions,
    classifier: deps.classifier,
    checkId: ctx.id,
    links: deps.links,
    sshUser: deps.sshUser,
    signal: ctx.signal,
    logger: logger.child('decide'),
  })
  ctx.signal.throwIfAborted()

  let notificationSent = false
  if (decision.action === 'send') {
    try {
      await deps.sink.send(decision.payload, channel, ctx.signal)
      notificationSent = true
      logger.info(`Notification sent to #${channel} (${ctx.id})`)
    } catch (e) {
      logError(logger, 'Notification delivery failed', e, { network, client, checkId: ctx.id })
    }
  } else {
    logger.info(`Notification suppressed: ${decision.reason}`)
  }

  ctx.signal.throwIfAborted()
  const registration = deps.registrations.get(network, client)
  if (registration) {
    deps.registrations.persist({ ...registration, lastCheckID: ctx.id, updatedAt: now().toISOString() })
  }

  return { notificationSent, decision }
}

/** Bind the pipeline's dependencies into a queue handler */
export function createEvaluationHandler(deps: PipelineDeps): EvaluationHandler {
  return (request, ctx) => evaluateTarget(request, ctx, deps)
}
