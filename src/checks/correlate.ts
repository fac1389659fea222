/**
 * Check correlator
 *
 * Works out which client is the underlying cause of a batch of failing nodes.
 *
 * - CL target: an EL client failing alongside more than MIN_FAILURES_FOR_ROOT_CAUSE
 *   distinct CL clients is the root cause (everyone on that EL is struggling).
 * - EL target: the target itself is the root cause once more than
 *   MIN_FAILURES_FOR_ROOT_CAUSE of its nodes fail.
 *
 * Target nodes whose failure no root cause explains are reported as unexplained issues.
 */

import type { ClientType } from '../clients/catalog.js'
import { createLogger, type Logger } from '../shared/logger.js'
import { parseClientPair, pairKey, type ClientPair } from './parseClientPair.js'
import type { AnalysisResult } from './types.js'

export const MIN_FAILURES_FOR_ROOT_CAUSE = 2

interface NodeStatus {
  name: string
  healthy: boolean
}

interface PairStatus {
  pair: ClientPair
  nodes: NodeStatus[]
}

export interface Correlator {
  addNodeStatus(nodeName: string, healthy: boolean): void
  analyze(): AnalysisResult
}

export interface CorrelatorOptions {
  target: string
  clientType: ClientType
  logger?: Logger
}

export function createCorrelator(options: CorrelatorOptions): Correlator {
  const { target, clientType } = options
  const logger = options.logger ?? createLogger('correlator')
  const statusByPair = new Map<string, PairStatus>()

  function isTargetPair(pair: ClientPair): boolean {
    return clientType === 'consensus' ? pair.consensus === target : pair.execution === target
  }

  function failingNodes(status: PairStatus): string[] {
    return status.nodes.filter(n => !n.healthy).map(n => n.name)
  }

  // EL client -> distinct CL clients it fails with
  function failingPeersByExecution(): Map<string, Set<string>> {
    const peers = new Map<string, Set<string>>()
    for (const status of statusByPair.values()) {
      const el = status.pair.execution
      if (!peers.has(el)) peers.set(el, new Set())
      if (failingNodes(status).length > 0) {
        peers.get(el)?.add(status.pair.consensus)
      }
    }
    return peers
  }

  function findRootCausesForConsensus(evidence: Record<string, string>): string[] {
    const rootCauses: string[] = []
    for (const [el, clPeers] of failingPeersByExecution()) {
      if (el === '') continue
      const failingWith = [...clPeers].sort()
      logger.debug(`${el} is failing with CL clients: ${failingWith.join(', ')}`)
      if (failingWith.length > MIN_FAILURES_FOR_ROOT_CAUSE) {
        rootCauses.push(el)
        evidence[el] = `Failing with ${failingWith.length} CL clients: ${failingWith.join(', ')}`
      }
    }
    return rootCauses.sort()
  }

  function findRootCausesForExecution(evidence: Record<string, string>): string[] {
    const targetFailures: string[] = []
    for (const status of statusByPair.values()) {
      if (isTargetPair(status.pair)) targetFailures.push(...failingNodes(status))
    }
    targetFailures.sort()

    if (targetFailures.length > MIN_FAILURES_FOR_ROOT_CAUSE) {
      evidence[target] = `Failing with ${targetFailures.length} nodes: ${targetFailures.join(', ')}`
      return [target]
    }
    return []
  }

  function isExplained(pair: ClientPair, rootCauses: string[]): boolean {
    return rootCauses.some(rootCause => {
      if (clientType === 'execution') {
        return rootCause === target || pair.consensus === rootCause
      }
      return pair.execution === rootCause
    })
  }

  function findUnexplainedIssues(rootCauses: string[]): string[] {
    const unexplained = new Set<string>()
    for (const status of statusByPair.values()) {
      if (!isTargetPair(status.pair) || isExplained(status.pair, rootCauses)) continue
      for (const name of failingNodes(status)) unexplained.add(name)
    }
    return [...unexplained].sort()
  }

  return {
    addNodeStatus(nodeName: string, healthy: boolean): void {
      const pair = parseClientPair(nodeName)
      const key = pairKey(pair)
      const existing = statusByPair.get(key)
      if (existing) {
        existing.nodes.push({ name: nodeName, healthy })
      } else {
        statusByPair.set(key, { pair, nodes: [{ name: nodeName, healthy }] })
      }
    },

    analyze(): AnalysisResult {
      const rootCauseEvidence: Record<string, string> = {}
      const rootCause =
        clientType === 'consensus'
          ? findRootCausesForConsensus(rootCauseEvidence)
          : findRootCausesForExecution(rootCauseEvidence)
      const unexplainedIssues = findUnexplainedIssues(rootCause)

      for (const cause of rootCause) {
        logger.info(`Root cause identified: ${cause} (${rootCauseEvidence[cause] ?? ''})`)
      }
      for (const issue of unexplainedIssues) {
        logger.info(`${issue} (unexplained issue)`)
      }

      return { rootCause, unexplainedIssues, rootCauseEvidence }
    },
  }
}

/** One-shot form: every node passed in is failing */
export function correlate(
  target: string,
  clientType: ClientType,
  failingNodes: Iterable<string>
): AnalysisResult {
  const correlator = createCorrelator({ target, clientType })
  for (const node of failingNodes) correlator.addNodeStatus(node, false)
  return correlator.analyze()
}
