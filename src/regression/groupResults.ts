import type { TestResult } from './types.js'

function isNewer(candidate: TestResult, existing: TestResult): boolean {
  return Date.parse(candidate.timestamp) > Date.parse(existing.timestamp)
}

/**
 * client -> test type -> latest result.
 * Runs that executed no tests are skipped when `skipEmpty` is set.
 */
export function groupLatestByClientAndTestType(
  results: readonly TestResult[],
  options: { skipEmpty?: boolean } = {}
): Map<string, Map<string, TestResult>> {
  const grouped = new Map<string, Map<string, TestResult>>()

  for (const result of results) {
    if (options.skipEmpty && result.ntests === 0) continue

    let byType = grouped.get(result.client)
    if (!byType) {
      byType = new Map()
      grouped.set(result.client, byType)
    }

    const existing = byType.get(result.name)
    if (!existing || isNewer(result, existing)) {
      byType.set(result.name, result)
    }
  }

  return grouped
}

/** Flattened form: only the latest result per client and test type */
export function filterLatestResults(results: readonly TestResult[]): TestResult[] {
  const latest: TestResult[] = []
  for (const byType of groupLatestByClientAndTestType(results).values()) {
    latest.push(...byType.values())
  }
  return latest
}
