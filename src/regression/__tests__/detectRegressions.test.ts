import { describe, it, expect } from 'vitest'
import { buildSummary } from '../buildSummary.js'
import { detectRegressions, formatRegressions } from '../detectRegressions.js'
import type { SummaryResult, TestResult } from '../types.js'
import { makeResult } from './fixtures.js'

function summaryOf(results: TestResult[]): SummaryResult {
  const summary = buildSummary('devnet-7', results)
  if (!summary) throw new Error('expected a summary')
  return summary
}

describe('detectRegressions', () => {
  const previousRaw = [
    makeResult({ passes: 8, fails: 2, timestamp: '2026-01-01T00:00:00Z' }),
    makeResult({ client: 'besu', passes: 7, fails: 3, timestamp: '2026-01-01T00:00:00Z' }),
  ]
  const currentRaw = [
    makeResult({ passes: 5, fails: 5, timestamp: '2026-01-02T00:00:00Z' }),
    makeResult({ client: 'besu', passes: 9, fails: 1, timestamp: '2026-01-02T00:00:00Z' }),
    makeResult({ client: 'reth', passes: 0, fails: 10, timestamp: '2026-01-02T00:00:00Z' }),
  ]

  it('should report clients whose failures grew', () => {
    const regressions = detectRegressions(summaryOf(currentRaw), summaryOf(previousRaw), {
      current: currentRaw,
      previous: previousRaw,
    })

    expect(Object.keys(regressions)).toEqual(['geth'])
    expect(regressions.geth).toEqual([
      '3 new failures (from 2 to 5)\n  Affected tests: `engine-api` (+3, 50.0% fail rate)',
    ])
  })

  it('should omit the test-type line without raw results', () => {
    const regressions = detectRegressions(summaryOf(currentRaw), summaryOf(previousRaw))
    expect(regressions.geth).toEqual(['3 new failures (from 2 to 5)'])
  })

  it('should report nothing for identical snapshots', () => {
    const summary = summaryOf(currentRaw)
    expect(detectRegressions(summary, summary, { current: currentRaw, previous: currentRaw })).toEqual({})
  })
})

describe('formatRegressions', () => {
  it('should list one bullet per message in client order', () => {
    expect(formatRegressions({ reth: ['1 new failures (from 0 to 1)'], geth: ['2 new failures (from 1 to 3)'] })).toBe(
      '• **geth**: 2 new failures (from 1 to 3)\n• **reth**: 1 new failures (from 0 to 1)'
    )
  })

  it('should say when nothing regressed', () => {
    expect(formatRegressions({})).toBe('No regressions detected')
  })
})
