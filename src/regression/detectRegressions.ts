/**
 * Regression detector
 *
 * Diffs the current snapshot against the previous one. A client regresses when
 * its failed-test count grows; the growth is then attributed to test types by
 * diffing the latest raw result per (client, test type) of both cycles.
 */

import { groupLatestByClientAndTestType } from './groupResults.js'
import type { RegressionMap, SummaryResult, TestResult } from './types.js'

export interface RawResults {
  current: readonly TestResult[]
  previous: readonly TestResult[]
}

/** Sorted `` `type` (+inc, rate% fail rate) `` items for one client */
export function findTestTypeRegressions(
  client: string,
  current: Map<string, Map<string, TestResult>>,
  previous: Map<string, Map<string, TestResult>>
): string[] {
  const currentByType = current.get(client)
  const previousByType = previous.get(client)
  if (!currentByType || !previousByType) return []

  const regressions: string[] = []
  for (const [testType, cur] of currentByType) {
    if (cur.fails === 0) continue

    const prev = previousByType.get(testType)
    if (!prev || cur.fails <= prev.fails) continue

    const failRate = cur.ntests > 0 ? (cur.fails / cur.ntests) * 100 : 0
    regressions.push(`\`${testType}\` (+${cur.fails - prev.fails}, ${failRate.toFixed(1)}% fail rate)`)
  }

  return regressions.sort()
}

export function detectRegressions(
  current: SummaryResult,
  previous: SummaryResult,
  raw: RawResults = { current: [], previous: [] }
): RegressionMap {
  const regressions: RegressionMap = {}
  const currentGrouped = groupLatestByClientAndTestType(raw.current, { skipEmpty: true })
  const previousGrouped = groupLatestByClientAndTestType(raw.previous, { skipEmpty: true })

  for (const clientName of Object.keys(current.clientResults).sort()) {
    const cur = current.clientResults[clientName]
    const prev = previous.clientResults[clientName]
    // new clients cannot regress
    if (!cur || cur.failedTests === 0 || !prev) continue
    if (cur.failedTests <= prev.failedTests) continue

    const increase = cur.failedTests - prev.failedTests
    let message = `${increase} new failures (from ${prev.failedTests} to ${cur.failedTests})`

    const byType = findTestTypeRegressions(clientName, currentGrouped, previousGrouped)
    if (byType.length > 0) {
      message += `\n  Affected tests: ${byType.join(', ')}`
    }

    regressions[clientName] = [message]
  }

  return regressions
}

export function formatRegressions(regressions: RegressionMap): string {
  const clients = Object.keys(regressions).sort()
  if (clients.length === 0) return 'No regressions detected'

  const lines: string[] = []
  for (const client of clients) {
    for (const message of regressions[client] ?? []) {
      lines.push(`• **${client}**: ${message}`)
    }
  }
  return lines.join('\n')
}
