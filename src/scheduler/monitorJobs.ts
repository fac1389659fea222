/**
 * Monitor cron jobs
 *
 * One node-cron job per registered target; each tick enqueues an evaluation.
 */

import cron from 'node-cron'
import type { MonitoredTarget } from '../store/types.js'
import { createLogger } from '../shared/logger.js'
import type { EvaluationQueue } from './queue.js'

const logger = createLogger('monitor-jobs')

let scheduledJobs: cron.ScheduledTask[] = []

/** Enqueue one evaluation for `target` and log how it ended */
export async function triggerEvaluation(target: MonitoredTarget, queue: EvaluationQueue): Promise<void> {
  const result = queue.enqueue({
    network: target.network,
    client: target.client,
    clientType: target.clientType,
    channel: target.channel,
  })

  if (!result.accepted) {
    logger.info(`Skipped ${result.key}: ${result.reason}`)
    return
  }

  const outcome = await result.outcome
  if (outcome.error) {
    logger.warn(`${outcome.key} (${outcome.id}) failed: ${outcome.error}`)
  } else {
    logger.info(`${outcome.key} (${outcome.id}) done, notification ${outcome.notificationSent ? 'sent' : 'not sent'}`)
  }
}

/**
 * Schedule every target on its own cron expression.
 * @returns how many jobs were scheduled
 */
export function registerMonitorJobs(targets: readonly MonitoredTarget[], queue: EvaluationQueue): number {
  let registered = 0

  for (const target of targets) {
    if (!cron.validate(target.schedule)) {
      logger.warn(`Invalid schedule "${target.schedule}" for ${target.client} on ${target.network}, skipping`)
      continue
    }

    const job = cron.schedule(target.schedule, async () => {
      await triggerEvaluation(target, queue)
    })
    scheduledJobs.push(job)
    registered++
    logger.debug(`Scheduled ${target.client} on ${target.network}: ${target.schedule}`)
  }

  return registered
}

export function stopMonitorJobs(): void {
  for (const job of scheduledJobs) {
    job.stop()
  }
  scheduledJobs = []
}
