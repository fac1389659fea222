/**
 * CLI: register / deregister / list monitored targets
 */

import type { Command } from 'commander'
import chalk from 'chalk'
import { parseClientType, type ClientType } from '../../clients/catalog.js'
import { loadConfig } from '../../config/loadConfig.js'
import { printError } from '../../shared/error.js'
import { success, error, info } from '../output.js'
import { DEFAULT_SCHEDULE, nextRunAt, renderTargetTable } from '../formatTargets.js'
import { createCatalog, createStores } from '../runtime.js'

interface RegisterOptions {
  type?: string
  channel: string
  schedule: string
}

/** Explicit `--type` wins; otherwise the catalog decides */
export function resolveClientType(
  client: string,
  typeOption: string | undefined,
  typeOf: (client: string) => ClientType | null
): ClientType | null {
  if (typeOption !== undefined) return parseClientType(typeOption)
  return typeOf(client)
}

export function registerAlertCommands(program: Command) {
  program
    .command('register')
    .description('Monitor a client on a network')
    .argument('<network>', 'Network name, e.g. devnet-7')
    .argument('<client>', 'Client name, e.g. lighthouse')
    .option('-t, --type <type>', 'Client type: cl/el (default: from the client catalog)')
    .option('-c, --channel <channel>', 'Destination channel', 'alerts')
    .option('-s, --schedule <cron>', 'Evaluation schedule (cron expression)', DEFAULT_SCHEDULE)
    .action(async (network: string, client: string, options: RegisterOptions) => {
      try {
        const config = await loadConfig()
        const clientType = resolveClientType(client, options.type, createCatalog(config).typeOf)
        if (!clientType) {
          error(
            options.type !== undefined
              ? `Unknown client type "${options.type}", expected cl or el`
              : `Unknown client "${client}", pass --type cl|el`
          )
          process.exitCode = 1
          return
        }

        const nextRun = nextRunAt(options.schedule)
        if (!nextRun) {
          error(`Invalid cron expression: "${options.schedule}"`)
          console.log('  Examples: "0 * * * *" (hourly), "*/30 * * * *" (every 30min), "0 9 * * 1-5" (weekdays 9am)')
          process.exitCode = 1
          return
        }

        const now = new Date().toISOString()
        createStores(config).registrations.register({
          network,
          client,
          clientType,
          channel: options.channel,
          schedule: options.schedule,
          createdAt: now,
          updatedAt: now,
        })

        success(`Registered ${client} (${clientType}) on ${network}`)
        console.log(`  Channel: #${options.channel}`)
        info(`Cron: ${chalk.cyan(options.schedule)} → next: ${nextRun}`)
      } catch (err) {
        printError(err)
        process.exitCode = 1
      }
    })

  program
    .command('deregister')
    .description('Stop monitoring a client on a network')
    .argument('<network>', 'Network name')
    .argument('<client>', 'Client name')
    .action(async (network: string, client: string) => {
      try {
        const config = await loadConfig()
        createStores(config).registrations.deregister(network, client)
        success(`Deregistered ${client} on ${network}`)
      } catch (err) {
        printError(err)
        process.exitCode = 1
      }
    })

  program
    .command('list')
    .alias('ls')
    .description('List monitored targets')
    .option('-n, --network <network>', 'Only targets on this network')
    .action(async (options: { network?: string }) => {
      const config = await loadConfig()
      const targets = createStores(config)
        .registrations.list()
        .filter(t => options.network === undefined || t.network === options.network)
      console.log(renderTargetTable(targets))
    })
}
