import { describe, it, expect, vi } from 'vitest'
import {
  buildLinks,
  decideNotification,
  hasOnlyInfraOrUnrelatedIssues,
  titleCase,
  type DecisionInput,
} from '../decideNotification.js'
import { createInstanceClassifier } from '../../classifier/classifyInstance.js'
import type { ProbeResult, ReachabilityProbe } from '../../classifier/probeSshBanner.js'
import type { AnalysisResult, CheckResult } from '../../checks/types.js'
import type { AlertTarget } from '../types.js'

const CHECK_ID = '20260101-000000-0123456789abcdef'
const TARGET: AlertTarget = { network: 'devnet-7', client: 'nimbus', clientType: 'consensus', channel: 'alerts' }
const REACHABLE: ProbeResult = { reachable: true, banner: 'SSH-2.0-' }

function failing(overrides: Partial<CheckResult> = {}): CheckResult {
  return {
    name: 'CL node synced',
    category: 'sync',
    status: 'fail',
    details: { notSyncedNodes: 'nimbus-geth-1 (peers: 0)\n' },
    affectedNodes: ['nimbus-geth-1'],
    ...overrides,
  }
}

function analysis(rootCause: string[], unexplainedIssues: string[] = []): AnalysisResult {
  return { rootCause, unexplainedIssues, rootCauseEvidence: {} }
}

function input(probe: ReachabilityProbe, overrides: Partial<DecisionInput> = {}): DecisionInput {
  return {
    target: TARGET,
    analysis: analysis(['nimbus']),
    results: [failing()],
    classifier: createInstanceClassifier({
      probe,
      preProductionClients: ['ethereumjs', 'nimbusel'],
      domain: 'ethpandaops.io',
      port: 22,
    }),
    checkId: CHECK_ID,
    ...overrides,
  }
}

describe('decideNotification', () => {
  it('should send with the instance as regular when the target is the root cause', async () => {
    const probe = vi.fn<ReachabilityProbe>(async () => REACHABLE)

    const decision = await decideNotification(input(probe))

    expect(probe).toHaveBeenCalledWith('nimbus-geth-1.devnet-7.ethpandaops.io', 22, undefined)
    expect(decision).toEqual({
      action: 'send',
      payload: {
        title: 'Nimbus',
        network: 'devnet-7',
        client: 'nimbus',
        clientType: 'consensus',
        channel: 'alerts',
        checkId: CHECK_ID,
        color: 0xe6644c,
        activeIssues: 1,
        categories: [
          {
            category: 'sync',
            label: 'Sync',
            checks: ['CL node synced'],
            instances: {
              regular: [{ name: 'nimbus-geth-1', sshHint: 'ssh devops@nimbus-geth-1.devnet-7.ethpandaops.io' }],
              unrelated: [],
              infrastructure: [],
            },
          },
        ],
        regressions: [],
        links: {},
        footer: `ID: ${CHECK_ID}`,
      },
    })
  })

  it('should suppress when the only instance times out', async () => {
    const probe: ReachabilityProbe = async () => ({ reachable: false, reason: 'connect-timeout' })

    expect(await decideNotification(input(probe))).toEqual({ action: 'suppress', reason: 'only-infra-or-unrelated' })
  })

  it('should suppress a target that is neither a root cause nor unexplained', async () => {
    const probe = vi.fn<ReachabilityProbe>(async () => REACHABLE)

    const decision = await decideNotification(
      input(probe, { analysis: analysis(['geth'], ['lighthouse-besu-1']) })
    )

    expect(decision).toEqual({ action: 'suppress', reason: 'not-eligible' })
    expect(probe).not.toHaveBeenCalled()
  })

  it('should suppress an eligible target without failing results', async () => {
    const decision = await decideNotification(
      input(async () => REACHABLE, {
        analysis: analysis([], ['nimbus-geth-1']),
        results: [failing({ status: 'pass' })],
      })
    )

    expect(decision).toEqual({ action: 'suppress', reason: 'no-failures' })
  })

  it('should suppress a mix of unreachable and unrelated instances', async () => {
    const probe: ReachabilityProbe = async host =>
      host.startsWith('nimbus-besu-1') ? { reachable: false, reason: 'read-timeout' } : REACHABLE

    const decision = await decideNotification(
      input(probe, {
        analysis: analysis([], ['nimbus-besu-1', 'nimbus-ethereumjs-1']),
        results: [failing({ details: { notSyncedNodes: 'nimbus-besu-1\nnimbus-ethereumjs-1' } })],
      })
    )

    expect(decision).toEqual({ action: 'suppress', reason: 'only-infra-or-unrelated' })
  })

  it('should send when one instance is regular among infrastructure issues', async () => {
    const probe: ReachabilityProbe = async host =>
      host.startsWith('nimbus-besu-1') ? { reachable: false, reason: 'connect-error' } : REACHABLE

    const decision = await decideNotification(
      input(probe, {
        analysis: analysis([], ['nimbus-besu-1', 'nimbus-geth-1']),
        results: [
          failing({ details: { notSyncedNodes: 'nimbus-geth-1\nnimbus-besu-1' } }),
          failing({ name: 'CL peer count', category: 'general', details: { lowPeerNodes: 'nimbus-geth-1 (3)' } }),
        ],
      })
    )

    expect(decision.action).toBe('send')
    if (decision.action !== 'send') return
    expect(decision.payload.activeIssues).toBe(2)
    expect(decision.payload.categories.map(c => c.category)).toEqual(['general', 'sync'])
    expect(decision.payload.categories[1]?.instances).toEqual({
      regular: [{ name: 'nimbus-geth-1', sshHint: 'ssh devops@nimbus-geth-1.devnet-7.ethpandaops.io' }],
      unrelated: [],
      infrastructure: ['nimbus-besu-1'],
    })
  })

  it('should still send when no instance can be parsed', async () => {
    const decision = await decideNotification(
      input(async () => REACHABLE, { results: [failing({ details: { notSyncedNodes: 'unknown' } })] })
    )

    expect(decision.action).toBe('send')
  })

  it('should carry the regressions of the target client', async () => {
    const decision = await decideNotification(
      input(async () => REACHABLE, {
        regressions: { nimbus: ['3 new failures (from 2 to 5)'], geth: ['1 new failures (from 0 to 1)'] },
      })
    )

    expect(decision.action === 'send' && decision.payload.regressions).toEqual(['3 new failures (from 2 to 5)'])
  })
})

describe('hasOnlyInfraOrUnrelatedIssues', () => {
  const regular = [{ name: 'nimbus-geth-1', sshHint: 'ssh devops@nimbus-geth-1' }]

  it.each([
    [{ regular: [], unrelated: [], infrastructure: [] }, false],
    [{ regular: [], unrelated: [], infrastructure: ['a-b'] }, true],
    [{ regular: [], unrelated: ['a-b'], infrastructure: [] }, true],
    [{ regular: [], unrelated: ['a-b'], infrastructure: ['c-d'] }, true],
    [{ regular, unrelated: ['a-b'], infrastructure: ['c-d'] }, false],
  ])('%o -> %s', (groups, expected) => {
    expect(hasOnlyInfraOrUnrelatedIssues(groups)).toBe(expected)
  })
})

describe('buildLinks', () => {
  it('should link the dashboards and the test report', () => {
    expect(
      buildLinks(TARGET, {
        grafanaBaseUrl: 'https://grafana.example.test/',
        dashboardId: 'dash',
        logsDashboardId: 'logs',
        hiveBaseUrl: 'https://hive.example.test',
      })
    ).toEqual({
      grafana:
        'https://grafana.example.test/d/dash?orgId=1&var-consensus_client=nimbus&var-execution_client=All&var-network=devnet-7',
      logs: 'https://grafana.example.test/d/logs?orgId=1&var-network=devnet-7',
      hive: 'https://hive.example.test/devnet-7/index.html#summary-sort=name&group-by=client',
    })
  })

  it('should return no links without a base URL', () => {
    expect(buildLinks(TARGET, { dashboardId: 'dash', logsDashboardId: 'logs' })).toEqual({})
  })
})

describe('titleCase', () => {
  it('should capitalize each word', () => {
    expect(titleCase('nimbus')).toBe('Nimbus')
    expect(titleCase('erigonTwo')).toBe('Erigontwo')
    expect(titleCase('my client')).toBe('My Client')
  })
})
