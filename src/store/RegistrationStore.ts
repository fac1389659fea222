/**
 * Registration store
 *
 * One JSON file per monitored target.
 */

import { existsSync, readdirSync } from 'fs'
import { basename } from 'path'
import { AlertAlreadyRegisteredError, AlertNotRegisteredError, AppError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import { readJson, writeJson, removeFile } from './readWriteJson.js'
import { STORE_PATHS, isSafeSegment } from './paths.js'
import { monitoredTargetSchema, type MonitoredTarget } from './types.js'

const logger = createLogger('registrations')

export interface RegistrationStore {
  list(): MonitoredTarget[]
  get(network: string, client: string): MonitoredTarget | null
  /** Create or overwrite */
  persist(target: MonitoredTarget): void
  /** @returns whether a registration was removed */
  purge(network: string, client: string): boolean
  /** Persist a new target; fails if it is already registered */
  register(target: MonitoredTarget): void
  deregister(network: string, client: string): void
}

function assertSafeKey(network: string, client: string): void {
  if (!isSafeSegment(network) || !isSafeSegment(client)) {
    throw AppError.validation(`invalid network/client: ${network}/${client}`)
  }
}

/** @param root `<dataDir>/<prefix>` */
export function createRegistrationStore(root: string): RegistrationStore {
  function get(network: string, client: string): MonitoredTarget | null {
    assertSafeKey(network, client)
    return readJson(STORE_PATHS.alertPath(root, network, client), monitoredTargetSchema)
  }

  function persist(target: MonitoredTarget): void {
    assertSafeKey(target.network, target.client)
    writeJson(STORE_PATHS.alertPath(root, target.network, target.client), target)
  }

  function purge(network: string, client: string): boolean {
    assertSafeKey(network, client)
    return removeFile(STORE_PATHS.alertPath(root, network, client))
  }

  return {
    get,
    persist,
    purge,

    list(): MonitoredTarget[] {
      const networksDir = STORE_PATHS.networksDir(root)
      if (!existsSync(networksDir)) return []

      const targets: MonitoredTarget[] = []
      for (const network of readdirSync(networksDir).sort()) {
        const alertsDir = STORE_PATHS.alertsDir(root, network)
        if (!existsSync(alertsDir)) continue

        for (const file of readdirSync(alertsDir).sort()) {
          if (!file.endsWith('.json')) continue
          const target = readJson(STORE_PATHS.alertPath(root, network, basename(file, '.json')), monitoredTargetSchema)
          if (target) {
            targets.push(target)
          } else {
            logger.warn(`Skipping unreadable registration ${network}/${file}`)
          }
        }
      }
      return targets
    },

    register(target: MonitoredTarget): void {
      if (get(target.network, target.client)) {
        throw new AlertAlreadyRegisteredError(target.network, target.client)
      }
      persist(target)
      logger.info(`Registered ${target.client} on ${target.network}`)
    },

    deregister(network: string, client: string): void {
      if (!purge(network, client)) {
        throw new AlertNotRegisteredError(network, client)
      }
      logger.info(`Deregistered ${client} on ${network}`)
    },
  }
}
