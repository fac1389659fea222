/**
 * Notification types
 */

import type { ClientType } from '../clients/catalog.js'
import type { CheckCategory } from '../checks/types.js'

/** Who is being evaluated and where the alert goes */
export interface AlertTarget {
  network: string
  client: string
  clientType: ClientType
  /** Destination identifier handed to the sink */
  channel: string
}

export interface RegularInstance {
  name: string
  /** e.g. `ssh devops@lighthouse-geth-1.devnet-7.ethpandaops.io` */
  sshHint: string
}

export interface InstanceGroups {
  regular: RegularInstance[]
  unrelated: string[]
  infrastructure: string[]
}

export interface CategorySection {
  category: CheckCategory
  label: string
  /** Unique failed check names, sorted */
  checks: string[]
  instances: InstanceGroups
}

export interface PayloadLinks {
  grafana?: string
  logs?: string
  hive?: string
}

export interface PayloadImage {
  fileName: string
  contentType: string
  /** base64 */
  data: string
}

export interface NotificationPayload {
  title: string
  network: string
  client: string
  clientType: ClientType
  channel: string
  checkId: string
  /** 0xRRGGBB */
  color: number
  /** Unique failed check names across categories */
  activeIssues: number
  categories: CategorySection[]
  regressions: string[]
  links: PayloadLinks
  footer: string
  image?: PayloadImage
}

export type SuppressReason = 'not-eligible' | 'no-failures' | 'only-infra-or-unrelated'

export type Decision =
  | { action: 'send'; payload: NotificationPayload }
  | { action: 'suppress'; reason: SuppressReason }

export interface NotificationSink {
  send(payload: NotificationPayload, channel: string, signal?: AbortSignal): Promise<void>
}
