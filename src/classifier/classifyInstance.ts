/**
 * Instance classifier
 *
 * Labels an affected node so the decision engine can tell a broken client
 * from a dead host or a failure that belongs to some other client.
 */

import { createLogger, type Logger } from '../shared/logger.js'
import { ensureError, getErrorMessage } from '../shared/assertError.js'
import type { ProbeResult, ReachabilityProbe } from './probeSshBanner.js'

export type InstanceCategory = 'infrastructure-issue' | 'unrelated' | 'regular'

export interface ClassifyContext {
  /** Client under evaluation */
  target: string
  rootCause: readonly string[]
}

/**
 * Pure part of classification: the probe outcome plus the static client sets.
 */
export function categorizeInstance(
  instanceName: string,
  probe: ProbeResult,
  context: ClassifyContext,
  preProduction: ReadonlySet<string>
): InstanceCategory {
  if (!probe.reachable) return 'infrastructure-issue'

  const rootCause = new Set(context.rootCause)
  // a client cannot be unrelated to its own failure
  if (rootCause.has(context.target)) return 'regular'

  const components = instanceName.split('-').slice(0, 2)
  const related = components.some(
    part => part !== context.target && (preProduction.has(part) || rootCause.has(part))
  )
  return related ? 'unrelated' : 'regular'
}

export interface InstanceClassifier {
  /** Rejects with the abort reason when `signal` cancels the probe */
  classify(
    instanceName: string,
    network: string,
    context: ClassifyContext,
    signal?: AbortSignal
  ): Promise<InstanceCategory>
  /** Host the probe connects to */
  hostFor(instanceName: string, network: string): string
}

export interface InstanceClassifierOptions {
  probe: ReachabilityProbe
  preProductionClients: Iterable<string>
  domain: string
  port: number
  logger?: Logger
}

export function createInstanceClassifier(options: InstanceClassifierOptions): InstanceClassifier {
  const { probe, domain, port } = options
  const preProduction: ReadonlySet<string> = new Set(options.preProductionClients)
  const logger = options.logger ?? createLogger('classifier')

  const hostFor = (instanceName: string, network: string) => `${instanceName}.${network}.${domain}`

  return {
    hostFor,

    async classify(instanceName, network, context, signal) {
      const host = hostFor(instanceName, network)
      const result: ProbeResult = await probe(host, port, signal).catch((error: unknown) => ({
        reachable: false as const,
        reason: 'connect-error' as const,
        detail: getErrorMessage(error),
      }))
      // cancellation says nothing about the host
      if (!result.reachable && result.reason === 'aborted') {
        throw ensureError(signal?.reason ?? `probe of ${host} aborted`)
      }
      if (!result.reachable) {
        logger.debug(`${host}:${port} unreachable (${result.reason}${result.detail ? `: ${result.detail}` : ''})`)
      }
      return categorizeInstance(instanceName, result, context, preProduction)
    },
  }
}
