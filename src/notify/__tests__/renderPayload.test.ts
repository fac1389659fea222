import { describe, it, expect } from 'vitest'
import { renderPayloadText } from '../renderPayload.js'
import type { NotificationPayload } from '../types.js'

const PAYLOAD: NotificationPayload = {
  title: 'Nimbus',
  network: 'devnet-7',
  client: 'nimbus',
  clientType: 'consensus',
  channel: 'alerts',
  checkId: 'abc',
  color: 0xe6644c,
  activeIssues: 2,
  categories: [
    {
      category: 'general',
      label: 'General',
      checks: ['CL peer count'],
      instances: {
        regular: [{ name: 'nimbus-geth-1', sshHint: 'ssh devops@nimbus-geth-1.devnet-7.ethpandaops.io' }],
        unrelated: ['nimbus-ethereumjs-1'],
        infrastructure: ['nimbus-besu-1'],
      },
    },
  ],
  regressions: ['3 new failures (from 2 to 5)'],
  links: { grafana: 'https://grafana.example.test/d/x', logs: 'https://grafana.example.test/d/y' },
  footer: 'ID: abc',
}

describe('renderPayloadText', () => {
  it('should render every section in order', () => {
    expect(renderPayloadText(PAYLOAD)).toBe(
      [
        'Nimbus · devnet-7',
        '2 active issue(s)',
        '',
        'General Issues',
        '- CL peer count',
        '',
        'Potential infrastructure issues',
        '  nimbus-besu-1',
        '',
        'Affected instances',
        '  nimbus-geth-1',
        '',
        'Affected instances (likely unrelated)',
        '  nimbus-ethereumjs-1',
        '',
        'SSH commands',
        '  ssh devops@nimbus-geth-1.devnet-7.ethpandaops.io',
        '',
        'Regressions',
        '- 3 new failures (from 2 to 5)',
        '',
        'Grafana: https://grafana.example.test/d/x',
        'Logs: https://grafana.example.test/d/y',
        '',
        'ID: abc',
      ].join('\n')
    )
  })

  it('should skip empty sections', () => {
    const text = renderPayloadText({ ...PAYLOAD, categories: [], regressions: [], links: {} })
    expect(text).toBe(['Nimbus · devnet-7', '2 active issue(s)', '', 'ID: abc'].join('\n'))
  })
})
