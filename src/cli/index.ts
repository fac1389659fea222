#!/usr/bin/env node
/**
 * devnet-alerts CLI
 *
 *   devnet-alerts register <network> <client>   - monitor a client
 *   devnet-alerts deregister <network> <client> - stop monitoring
 *   devnet-alerts list                          - registered targets
 *   devnet-alerts run <network> <client>        - evaluate once, now
 *   devnet-alerts start                         - evaluate on schedule until Ctrl+C
 *   devnet-alerts regressions <network>         - diff the stored snapshots
 */

import { Command } from 'commander'
import { registerAlertCommands } from './commands/alerts.js'
import { registerMonitorCommands } from './commands/monitor.js'
import { registerRegressionCommand } from './commands/regressions.js'
import { error } from './output.js'
import { getErrorMessage } from '../shared/assertError.js'

const program = new Command()

program
  .name('devnet-alerts')
  .description('Devnet client health alerts')
  .version('0.1.0')

registerAlertCommands(program)
registerMonitorCommands(program)
registerRegressionCommand(program)

program.parseAsync().catch((err: unknown) => {
  error(`Failed: ${getErrorMessage(err)}`)
  process.exitCode = 1
})
