/**
 * Two-pass check run
 *
 * Checks are executed against every client on the network so the correlator
 * sees the whole picture, then the failing results are narrowed down to the
 * target client before they reach the decision engine.
 */

import type { ClientType } from '../clients/catalog.js'
import { AppError } from '../shared/error.js'
import { createLogger, type Logger } from '../shared/logger.js'
import { createCorrelator } from './correlate.js'
import type { AnalysisResult, CheckResult, DetailValue } from './types.js'

export interface CheckRunRequest {
  network: string
  client: string
  clientType: ClientType
}

/** Runs the health checks for a network; returns results for all clients */
export interface CheckExecutor {
  run(request: CheckRunRequest, signal?: AbortSignal): Promise<CheckResult[]>
}

export interface CheckRun {
  /** Failing results that concern the target client */
  results: CheckResult[]
  analysis: AnalysisResult
}

// passed through untouched when filtering details
const PASSTHROUGH_DETAIL_KEYS = new Set(['query'])

function filterDetailValue(value: DetailValue, client: string): DetailValue | null {
  if (typeof value === 'string') {
    const lines = value.split('\n').filter(line => line.includes(client))
    return lines.length > 0 ? lines.join('\n') : null
  }
  if (Array.isArray(value)) {
    const items = value.filter(item => item.includes(client))
    return items.length > 0 ? items : null
  }
  return null
}

/** Copy of a failing result restricted to lines mentioning `client`; null if none do */
export function filterResultForClient(result: CheckResult, client: string): CheckResult | null {
  const affectedNodes = result.affectedNodes.filter(node => node.includes(client))
  if (affectedNodes.length === 0) return null

  const details: Record<string, DetailValue> = {}
  for (const [key, value] of Object.entries(result.details)) {
    if (PASSTHROUGH_DETAIL_KEYS.has(key)) {
      details[key] = value
      continue
    }
    const filtered = filterDetailValue(value, client)
    if (filtered !== null) details[key] = filtered
  }

  return { ...result, details, affectedNodes }
}

export async function runChecks(
  executor: CheckExecutor,
  request: CheckRunRequest,
  options: { signal?: AbortSignal; logger?: Logger } = {}
): Promise<CheckRun> {
  const logger = options.logger ?? createLogger('checks')
  logger.info(`Running checks for ${request.client} on ${request.network}`)

  let all: CheckResult[]
  try {
    all = await executor.run(request, options.signal)
  } catch (error) {
    if (error instanceof AppError) throw error
    throw AppError.checkExecution(error instanceof Error ? error.message : String(error), error)
  }

  const correlator = createCorrelator({
    target: request.client,
    clientType: request.clientType,
    logger: logger.child('correlator'),
  })

  // first pass: every failing node feeds the analysis
  for (const result of all) {
    if (result.status !== 'fail') continue
    for (const node of result.affectedNodes) correlator.addNodeStatus(node, false)
  }
  const analysis = correlator.analyze()

  // second pass: keep only what concerns the target
  const results: CheckResult[] = []
  for (const result of all) {
    if (result.status !== 'fail') continue
    const filtered = filterResultForClient(result, request.client)
    if (filtered) results.push(filtered)
  }

  logger.debug(`${results.length}/${all.length} results concern ${request.client}`)
  return { results, analysis }
}
