import type { CheckResult } from '../checks/types.js'

/** Detail keys that list affected nodes, one per line */
export const INSTANCE_DETAIL_KEYS = ['lowPeerNodes', 'notSyncedNodes', 'stuckNodes', 'behindNodes'] as const

/**
 * Node name from a detail line such as `lighthouse-geth-1 (peers: 0)`
 * or `(3) lighthouse-geth-1`. Null when the line does not name a node of `client`.
 */
export function parseInstanceLine(line: string, client: string): string | null {
  const fields = line.split(/\s+/).filter(Boolean)
  let token = fields[0]
  if (token === undefined) return null

  const second = fields[1]
  if (token.startsWith('(') && second !== undefined) token = second

  const name = token.split(' (')[0] ?? token
  const parts = name.split('-')
  if (parts.length < 2) return null

  return parts[0] === client || parts[1] === client ? name : null
}

/** Unique, sorted node names of `client` mentioned by the failing results */
export function extractInstances(results: readonly CheckResult[], client: string): string[] {
  const instances = new Set<string>()

  for (const result of results) {
    for (const key of INSTANCE_DETAIL_KEYS) {
      const value = result.details[key]
      if (typeof value !== 'string') continue

      for (const line of value.split('\n')) {
        const name = parseInstanceLine(line, client)
        if (name) instances.add(name)
      }
    }
  }

  return [...instances].sort()
}
