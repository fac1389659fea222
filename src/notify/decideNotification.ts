/**
 * Notification decision engine
 *
 * Turns one evaluation's check results, correlator analysis and regressions
 * into either a payload or a reason to stay quiet.
 */

import type { AnalysisResult, CheckResult } from '../checks/types.js'
import { CATEGORY_LABELS, CATEGORY_ORDER } from '../checks/types.js'
import type { ClassifyContext, InstanceCategory, InstanceClassifier } from '../classifier/classifyInstance.js'
import type { RegressionMap } from '../regression/types.js'
import { createLogger, type Logger } from '../shared/logger.js'
import { extractInstances } from './extractInstances.js'
import { hashToColor } from './hashToColor.js'
import type {
  AlertTarget,
  CategorySection,
  Decision,
  InstanceGroups,
  NotificationPayload,
  PayloadImage,
  PayloadLinks,
} from './types.js'

export interface LinkOptions {
  grafanaBaseUrl?: string
  dashboardId: string
  logsDashboardId: string
  hiveBaseUrl?: string
}

export interface DecisionInput {
  target: AlertTarget
  analysis: AnalysisResult
  /** Results for the target client */
  results: readonly CheckResult[]
  regressions?: RegressionMap
  classifier: InstanceClassifier
  checkId: string
  links?: LinkOptions
  /** User in the SSH hint (default `devops`) */
  sshUser?: string
  image?: PayloadImage
  signal?: AbortSignal
  logger?: Logger
}

export function isEligible(client: string, analysis: AnalysisResult): boolean {
  return analysis.rootCause.includes(client) || analysis.unexplainedIssues.some(issue => issue.includes(client))
}

/** True when there is something to show but none of it points at the target */
export function hasOnlyInfraOrUnrelatedIssues(groups: InstanceGroups): boolean {
  const total = groups.regular.length + groups.unrelated.length + groups.infrastructure.length
  return total > 0 && groups.regular.length === 0
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}\p{N}])(\p{L})/gu, (_match, sep: string, ch: string) => sep + ch.toUpperCase())
}

export function buildLinks(target: AlertTarget, options: LinkOptions | undefined): PayloadLinks {
  const links: PayloadLinks = {}
  if (!options) return links

  const network = encodeURIComponent(target.network)
  const grafana = options.grafanaBaseUrl?.replace(/\/+$/, '')
  if (grafana) {
    const consensus = target.clientType === 'consensus' ? target.client : 'All'
    const execution = target.clientType === 'execution' ? target.client : 'All'
    links.grafana =
      `${grafana}/d/${options.dashboardId}?orgId=1` +
      `&var-consensus_client=${encodeURIComponent(consensus)}` +
      `&var-execution_client=${encodeURIComponent(execution)}` +
      `&var-network=${network}`
    links.logs = `${grafana}/d/${options.logsDashboardId}?orgId=1&var-network=${network}`
  }

  const hive = options.hiveBaseUrl?.replace(/\/+$/, '')
  if (hive) {
    links.hive = `${hive}/${network}/index.html#summary-sort=name&group-by=client`
  }
  return links
}

function groupInstances(
  names: readonly string[],
  categories: ReadonlyMap<string, InstanceCategory>,
  sshHint: (name: string) => string
): InstanceGroups {
  const groups: InstanceGroups = { regular: [], unrelated: [], infrastructure: [] }
  for (const name of names) {
    switch (categories.get(name)) {
      case 'infrastructure-issue':
        groups.infrastructure.push(name)
        break
      case 'unrelated':
        groups.unrelated.push(name)
        break
      default:
        groups.regular.push({ name, sshHint: sshHint(name) })
    }
  }
  return groups
}

function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort()
}

export async function decideNotification(input: DecisionInput): Promise<Decision> {
  const { target, analysis, classifier, checkId } = input
  const logger = input.logger ?? createLogger('decide')

  if (!isEligible(target.client, analysis)) {
    logger.debug(`${target.client} is neither a root cause nor has unexplained issues`)
    return { action: 'suppress', reason: 'not-eligible' }
  }

  const failed = input.results.filter(result => result.status === 'fail')
  if (failed.length === 0) {
    return { action: 'suppress', reason: 'no-failures' }
  }

  const instances = extractInstances(failed, target.client)
  const context: ClassifyContext = { target: target.client, rootCause: analysis.rootCause }
  const classified = await Promise.all(
    instances.map(async name => [name, await classifier.classify(name, target.network, context, input.signal)] as const)
  )
  const categories = new Map<string, InstanceCategory>(classified)

  const sshUser = input.sshUser ?? 'devops'
  const sshHint = (name: string) => `ssh ${sshUser}@${classifier.hostFor(name, target.network)}`

  const overall = groupInstances(instances, categories, sshHint)
  if (hasOnlyInfraOrUnrelatedIssues(overall)) {
    logger.info(
      `Suppressing ${target.client} on ${target.network}: ` +
        `${overall.infrastructure.length} infrastructure, ${overall.unrelated.length} unrelated`
    )
    return { action: 'suppress', reason: 'only-infra-or-unrelated' }
  }

  const sections: CategorySection[] = []
  for (const category of CATEGORY_ORDER) {
    const inCategory = failed.filter(result => result.category === category)
    if (inCategory.length === 0) continue

    sections.push({
      category,
      label: CATEGORY_LABELS[category],
      checks: uniqueSorted(inCategory.map(result => result.name)),
      instances: groupInstances(extractInstances(inCategory, target.client), categories, sshHint),
    })
  }

  const payload: NotificationPayload = {
    title: target.client ? titleCase(target.client) : target.network,
    network: target.network,
    client: target.client,
    clientType: target.clientType,
    channel: target.channel,
    checkId,
    color: hashToColor(target.network),
    activeIssues: uniqueSorted(failed.map(result => result.name)).length,
    categories: sections,
    regressions: input.regressions?.[target.client] ?? [],
    links: buildLinks(target, input.links),
    footer: `ID: ${checkId}`,
  }
  if (input.image) payload.image = input.image

  return { action: 'send', payload }
}
