import type { TestResult } from '../types.js'

export function makeResult(overrides: Partial<TestResult> = {}): TestResult {
  return {
    name: 'engine-api',
    client: 'geth',
    version: 'v1.0.0',
    ntests: 10,
    passes: 10,
    fails: 0,
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}
