import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, rmSync, writeFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { createRegistrationStore, type RegistrationStore } from '../RegistrationStore.js'
import { DATA_DIR, STORE_PATHS } from '../paths.js'
import type { MonitoredTarget } from '../types.js'

const ROOT = join(DATA_DIR, 'registration-test')

function target(overrides: Partial<MonitoredTarget> = {}): MonitoredTarget {
  return {
    network: 'devnet-7',
    client: 'geth',
    clientType: 'execution',
    channel: 'alerts',
    schedule: '*/30 * * * *',
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  }
}

describe('RegistrationStore', () => {
  let store: RegistrationStore

  beforeEach(() => {
    rmSync(ROOT, { recursive: true, force: true })
    store = createRegistrationStore(ROOT)
  })

  afterEach(() => {
    rmSync(ROOT, { recursive: true, force: true })
  })

  it('should write the target under its network and client', () => {
    store.persist(target())

    expect(existsSync(join(ROOT, 'networks', 'devnet-7', 'alerts', 'geth.json'))).toBe(true)
    expect(store.get('devnet-7', 'geth')).toEqual(target())
  })

  it('should return null for an unknown target', () => {
    expect(store.get('devnet-7', 'reth')).toBeNull()
  })

  it('should refuse a second registration', () => {
    store.register(target())

    expect(() => store.register(target())).toThrow(
      'client geth is already registered for network devnet-7 in this channel'
    )
  })

  it('should refuse to deregister an unknown target', () => {
    expect(() => store.deregister('devnet-7', 'reth')).toThrow('client reth is not registered for network devnet-7')
  })

  it('should remove a target on deregister', () => {
    store.register(target())
    store.deregister('devnet-7', 'geth')

    expect(store.get('devnet-7', 'geth')).toBeNull()
    expect(store.purge('devnet-7', 'geth')).toBe(false)
  })

  it('should list every network sorted and skip unreadable files', () => {
    store.persist(target({ network: 'devnet-8', client: 'teku', clientType: 'consensus' }))
    store.persist(target({ client: 'reth' }))
    store.persist(target())
    mkdirSync(STORE_PATHS.alertsDir(ROOT, 'devnet-8'), { recursive: true })
    writeFileSync(STORE_PATHS.alertPath(ROOT, 'devnet-8', 'broken'), '{not json')

    expect(store.list().map(t => `${t.network}/${t.client}`)).toEqual([
      'devnet-7/geth',
      'devnet-7/reth',
      'devnet-8/teku',
    ])
  })

  it('should reject path segments', () => {
    expect(() => store.get('../etc', 'geth')).toThrow('invalid network/client')
  })
})
