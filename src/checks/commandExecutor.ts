/**
 * Check executor backed by an external command.
 *
 * The command is called as `<command> ...args --network <n> --client <c> --client-type <t>`
 * and must print a JSON array of check results on stdout.
 */

import { execa } from 'execa'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import type { CheckExecutor, CheckRunRequest } from './runChecks.js'
import { checkResultsSchema, type CheckResult } from './types.js'

const logger = createLogger('check-command')

export interface CommandExecutorOptions {
  command: string
  args?: string[]
  timeoutMs?: number
}

export function buildCheckArgs(baseArgs: string[], request: CheckRunRequest): string[] {
  return [
    ...baseArgs,
    '--network',
    request.network,
    '--client',
    request.client,
    '--client-type',
    request.clientType,
  ]
}

export function parseCheckOutput(stdout: string): CheckResult[] {
  let raw: unknown
  try {
    raw = JSON.parse(stdout)
  } catch (e) {
    throw AppError.checkExecution(`output is not JSON (${getErrorMessage(e)})`, e)
  }

  const parsed = checkResultsSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown issue'
    throw AppError.checkExecution(`output does not match the result schema (${where})`)
  }
  return parsed.data
}

export function createCommandCheckExecutor(options: CommandExecutorOptions): CheckExecutor {
  const { command, args = [], timeoutMs = 120_000 } = options

  return {
    async run(request: CheckRunRequest, signal?: AbortSignal): Promise<CheckResult[]> {
      const fullArgs = buildCheckArgs(args, request)
      logger.debug(`Running ${command} ${fullArgs.join(' ')}`)

      try {
        const { stdout } = await execa(command, fullArgs, {
          timeout: timeoutMs,
          stdin: 'ignore',
          ...(signal ? { cancelSignal: signal } : {}),
        })
        return parseCheckOutput(stdout)
      } catch (e) {
        if (e instanceof AppError) throw e
        throw AppError.checkExecution(`${command} failed: ${getErrorMessage(e)}`, e)
      }
    },
  }
}
