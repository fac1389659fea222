/**
 * Roll raw test results up into a network snapshot.
 * Only the latest result per client and test type counts.
 */

import { groupLatestByClientAndTestType } from './groupResults.js'
import type { ClientSummary, SummaryResult, TestResult } from './types.js'

const UNKNOWN_VERSION = 'unknown'

function passRate(passed: number, total: number): number {
  return total > 0 ? (passed / total) * 100 : 0
}

export function buildSummary(network: string, results: readonly TestResult[]): SummaryResult | null {
  if (results.length === 0) return null

  let latest = 0
  for (const result of results) {
    const ts = Date.parse(result.timestamp)
    if (Number.isFinite(ts) && ts > latest) latest = ts
  }

  const summary: SummaryResult = {
    network,
    timestamp: new Date(latest > 0 ? latest : Date.now()).toISOString(),
    totalTests: 0,
    totalPasses: 0,
    totalFails: 0,
    overallPassRate: 0,
    clientResults: {},
    testTypes: [...new Set(results.map(r => r.name))].sort(),
  }

  for (const [clientName, byType] of groupLatestByClientAndTestType(results)) {
    const client: ClientSummary = {
      clientName,
      clientVersion: UNKNOWN_VERSION,
      totalTests: 0,
      passedTests: 0,
      failedTests: 0,
      passRate: 0,
      testTypes: [...byType.keys()].sort(),
    }

    for (const result of byType.values()) {
      if (client.clientVersion === UNKNOWN_VERSION && result.version !== '') {
        client.clientVersion = result.version
      }
      client.totalTests += result.ntests
      client.passedTests += result.passes
      client.failedTests += result.fails
    }
    client.passRate = passRate(client.passedTests, client.totalTests)

    summary.totalTests += client.totalTests
    summary.totalPasses += client.passedTests
    summary.totalFails += client.failedTests
    summary.clientResults[clientName] = client
  }

  summary.overallPassRate = passRate(summary.totalPasses, summary.totalTests)
  return summary
}
