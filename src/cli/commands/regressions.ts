import type { Command } from 'commander'
import chalk from 'chalk'
import { loadConfig } from '../../config/loadConfig.js'
import { detectRegressions, formatRegressions } from '../../regression/detectRegressions.js'
import { printError } from '../../shared/error.js'
import { header, info } from '../output.js'
import { createStores } from '../runtime.js'

export function registerRegressionCommand(program: Command) {
  program
    .command('regressions')
    .description('Show regressions between the two newest stored snapshots')
    .argument('<network>', 'Network name')
    .action(async (network: string) => {
      try {
        const config = await loadConfig()
        const { snapshots } = createStores(config)

        const [latestDate, previousDate] = snapshots.listDates(network)
        const latest = snapshots.getLatest(network)
        const previous = snapshots.getPrevious(network)
        if (!latest || !previous.ok) {
          info(previous.ok ? `No snapshots stored for ${network}` : previous.error.message)
          return
        }

        header(`${network}: ${previousDate} → ${latestDate}`)
        const regressions = detectRegressions(latest.summary, previous.value.summary, {
          current: latest.results,
          previous: previous.value.results,
        })
        console.log(formatRegressions(regressions))
        console.log(chalk.dim(`\n  ${latest.summary.totalFails}/${latest.summary.totalTests} failing in the latest snapshot`))
      } catch (err) {
        printError(err)
        process.exitCode = 1
      }
    })
}
