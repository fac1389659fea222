import { describe, it, expect } from 'vitest'
import { extractInstances, parseInstanceLine } from '../extractInstances.js'
import type { CheckResult } from '../../checks/types.js'

describe('parseInstanceLine', () => {
  it.each([
    ['nimbus-geth-1 (peers: 0)', 'nimbus', 'nimbus-geth-1'],
    ['(3) lighthouse-geth-2', 'geth', 'lighthouse-geth-2'],
    ['  teku-besu-1  ', 'besu', 'teku-besu-1'],
    ['teku-besu-1', 'geth', null],
    ['geth', 'geth', null],
    ['', 'geth', null],
  ])('%j for %s -> %s', (line, client, expected) => {
    expect(parseInstanceLine(line, client)).toBe(expected)
  })
})

describe('extractInstances', () => {
  it('should collect, dedupe and sort names from the node detail keys', () => {
    const results: CheckResult[] = [
      {
        name: 'CL node synced',
        category: 'sync',
        status: 'fail',
        details: {
          notSyncedNodes: 'teku-geth-2\nlighthouse-geth-1',
          stuckNodes: 'lighthouse-geth-1',
          query: 'teku-geth-9',
          behindNodes: ['prysm-geth-1'],
        },
        affectedNodes: [],
      },
      {
        name: 'EL peer count',
        category: 'general',
        status: 'fail',
        details: { lowPeerNodes: 'lodestar-geth-1 (peers: 1)\nlodestar-besu-1' },
        affectedNodes: [],
      },
    ]

    expect(extractInstances(results, 'geth')).toEqual(['lighthouse-geth-1', 'lodestar-geth-1', 'teku-geth-2'])
  })
})
