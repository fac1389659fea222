/**
 * Plain-text rendering of a notification payload
 */

import type { CategorySection, NotificationPayload } from './types.js'

export const SECTION_HEADERS = {
  regular: 'Affected instances',
  unrelated: 'Affected instances (likely unrelated)',
  infrastructure: 'Potential infrastructure issues',
  ssh: 'SSH commands',
} as const

function renderList(header: string, items: readonly string[]): string[] {
  if (items.length === 0) return []
  return ['', header, ...items.map(item => `  ${item}`)]
}

function renderSection(section: CategorySection): string[] {
  const { instances } = section
  return [
    '',
    `${section.label} Issues`,
    ...section.checks.map(check => `- ${check}`),
    ...renderList(SECTION_HEADERS.infrastructure, instances.infrastructure),
    ...renderList(
      SECTION_HEADERS.regular,
      instances.regular.map(i => i.name)
    ),
    ...renderList(SECTION_HEADERS.unrelated, instances.unrelated),
    ...renderList(
      SECTION_HEADERS.ssh,
      instances.regular.map(i => i.sshHint)
    ),
  ]
}

export function renderPayloadText(payload: NotificationPayload): string {
  const lines = [`${payload.title} · ${payload.network}`, `${payload.activeIssues} active issue(s)`]

  for (const section of payload.categories) {
    lines.push(...renderSection(section))
  }

  if (payload.regressions.length > 0) {
    lines.push('', 'Regressions')
    lines.push(...payload.regressions.map(line => `- ${line}`))
  }

  const { grafana, logs, hive } = payload.links
  const links = [
    grafana && `Grafana: ${grafana}`,
    logs && `Logs: ${logs}`,
    hive && `Hive: ${hive}`,
  ].filter((link): link is string => Boolean(link))
  if (links.length > 0) lines.push('', ...links)

  if (payload.image) lines.push('', `Attachment: ${payload.image.fileName}`)

  lines.push('', payload.footer)
  return lines.join('\n')
}
