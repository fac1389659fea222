/**
 * Client catalog
 *
 * Which names are consensus (CL) or execution (EL) clients, and which are
 * pre-production. Built from config so tests can pass their own lists.
 */

import type { ClientsConfig } from '../config/schema.js'

export type ClientType = 'consensus' | 'execution'

export interface ClientCatalog {
  readonly consensus: ReadonlySet<string>
  readonly execution: ReadonlySet<string>
  readonly preProduction: ReadonlySet<string>
  isConsensus(client: string): boolean
  isExecution(client: string): boolean
  isPreProduction(client: string): boolean
  /** Type of a known client, null when the catalog does not list it */
  typeOf(client: string): ClientType | null
}

export function createClientCatalog(config: ClientsConfig): ClientCatalog {
  const consensus = new Set(config.consensus)
  const execution = new Set(config.execution)
  const preProduction = new Set(config.preProduction)

  return {
    consensus,
    execution,
    preProduction,
    isConsensus: client => consensus.has(client),
    isExecution: client => execution.has(client),
    isPreProduction: client => preProduction.has(client),
    typeOf(client) {
      if (consensus.has(client)) return 'consensus'
      if (execution.has(client)) return 'execution'
      return null
    },
  }
}

const CLIENT_TYPE_ALIASES: Record<string, ClientType> = {
  cl: 'consensus',
  consensus: 'consensus',
  el: 'execution',
  execution: 'execution',
}

/** Accepts `cl`/`el` as well as the full names */
export function parseClientType(value: string): ClientType | null {
  return CLIENT_TYPE_ALIASES[value.toLowerCase()] ?? null
}
