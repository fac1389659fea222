/**
 * CLI: one-off evaluations and the long-running monitor
 */

import type { Command } from 'commander'
import chalk from 'chalk'
import { parseClientType } from '../../clients/catalog.js'
import { loadConfig } from '../../config/loadConfig.js'
import type { EvaluationOutcome, EvaluationQueue, EvaluationRequest } from '../../scheduler/queue.js'
import { registerMonitorJobs, stopMonitorJobs } from '../../scheduler/monitorJobs.js'
import { printError } from '../../shared/error.js'
import { setLogLevel } from '../../shared/logger.js'
import { success, error, warn, info, list } from '../output.js'
import { createCatalog, createPipelineDeps, createQueue, createStores } from '../runtime.js'

interface RunOptions {
  type?: string
  channel?: string
  verbose?: boolean
}

function printOutcome(outcome: EvaluationOutcome): void {
  if (outcome.error) {
    error(`Evaluation ${outcome.id} failed: ${outcome.error}`)
    process.exitCode = 1
    return
  }

  const decision = outcome.decision
  if (decision?.action === 'suppress') {
    info(`Notification suppressed (${decision.reason})`)
  } else if (outcome.notificationSent) {
    success('Notification sent')
  } else {
    warn('Notification was not delivered')
  }
  list([
    { label: 'Check ID', value: outcome.id },
    { label: 'Key', value: outcome.key, dim: true },
  ])
}

export function registerMonitorCommands(program: Command) {
  program
    .command('run')
    .description('Evaluate one client now')
    .argument('<network>', 'Network name')
    .argument('<client>', 'Client name')
    .option('-t, --type <type>', 'Client type: cl/el (default: registration, then catalog)')
    .option('-c, --channel <channel>', 'Destination channel (default: registration, then "alerts")')
    .option('-v, --verbose', 'Debug logging')
    .action(async (network: string, client: string, options: RunOptions) => {
      if (options.verbose) setLogLevel('debug')

      try {
        const config = await loadConfig()
        const stores = createStores(config)
        const registered = stores.registrations.get(network, client)

        const clientType =
          (options.type !== undefined ? parseClientType(options.type) : null) ??
          registered?.clientType ??
          createCatalog(config).typeOf(client)
        if (!clientType) {
          error(`Cannot tell whether ${client} is a CL or EL client, pass --type cl|el`)
          process.exitCode = 1
          return
        }

        const request: EvaluationRequest = {
          network,
          client,
          clientType,
          channel: options.channel ?? registered?.channel ?? 'alerts',
        }

        const queue = createQueue(config, createPipelineDeps(config, stores))
        queue.start()
        const result = queue.enqueue(request)
        if (!result.accepted) {
          error(`Evaluation rejected: ${result.reason}`)
          process.exitCode = 1
          await queue.stop()
          return
        }

        info(`Evaluating ${client} on ${network} (${result.id})`)
        printOutcome(await result.outcome)
        await queue.stop({ graceful: true })
      } catch (err) {
        printError(err)
        process.exitCode = 1
      }
    })

  program
    .command('start')
    .description('Evaluate every registered target on its schedule (Ctrl+C to stop)')
    .option('-v, --verbose', 'Debug logging')
    .action(async (options: { verbose?: boolean }) => {
      if (options.verbose) setLogLevel('debug')

      const config = await loadConfig()
      const stores = createStores(config)
      const targets = stores.registrations.list()
      if (targets.length === 0) {
        warn('No targets registered, use "devnet-alerts register <network> <client>" first')
        return
      }

      let queue: EvaluationQueue
      try {
        queue = createQueue(config, createPipelineDeps(config, stores))
      } catch (err) {
        printError(err)
        process.exitCode = 1
        return
      }

      queue.start()
      const scheduled = registerMonitorJobs(targets, queue)
      console.log(chalk.green(`✓ Monitoring ${scheduled}/${targets.length} target(s) (PID: ${process.pid})`))
      console.log(chalk.gray('  Ctrl+C to stop'))

      const signal = await new Promise<NodeJS.Signals>(resolve => {
        process.once('SIGINT', resolve)
        process.once('SIGTERM', resolve)
      })

      console.log(chalk.yellow(`\n${signal} received, stopping...`))
      stopMonitorJobs()
      await queue.stop({ graceful: true })
      const metrics = queue.metrics()
      info(`Stopped after ${metrics.succeeded} successful and ${metrics.failed} failed evaluation(s)`)
    })
}
