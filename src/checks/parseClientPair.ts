/**
 * Node names look like `<cl>-<el>-<index>`, e.g. `lighthouse-geth-1`.
 */

export interface ClientPair {
  consensus: string
  execution: string
}

const EMPTY_PAIR: ClientPair = { consensus: '', execution: '' }

/** Names with fewer than three parts give an empty pair */
export function parseClientPair(nodeName: string): ClientPair {
  const parts = nodeName.split('-')
  if (parts.length < 3) return EMPTY_PAIR
  const [consensus = '', execution = ''] = parts
  return { consensus, execution }
}

export function pairKey(pair: ClientPair): string {
  return `${pair.consensus}-${pair.execution}`
}
