/**
 * Storage paths
 *
 * Data dir resolution:
 * 1. DEVNET_ALERTS_DATA_DIR
 * 2. `.devnet-alerts-data` in the working directory
 *
 * Layout under the data dir, `<prefix>` being `data.prefix` from the config:
 * - `<prefix>/networks/<network>/alerts/<client>.json`
 * - `<prefix>/networks/<network>/hive_summary/results/<YYYY-MM-DD>.json`
 */

import { isAbsolute, join } from 'path'

const DEFAULT_DATA_DIR_NAME = '.devnet-alerts-data'

function getDataDir(): string {
  const envDir = process.env.DEVNET_ALERTS_DATA_DIR
  if (envDir) {
    return isAbsolute(envDir) ? envDir : join(process.cwd(), envDir)
  }
  return join(process.cwd(), DEFAULT_DATA_DIR_NAME)
}

export const DATA_DIR = getDataDir()

export const DIR_NAMES = {
  NETWORKS: 'networks',
  ALERTS: 'alerts',
  SUMMARY: 'hive_summary',
  RESULTS: 'results',
} as const

/** Key builders relative to a store root (`<dataDir>/<prefix>`) */
export const STORE_PATHS = {
  networksDir: (root: string) => join(root, DIR_NAMES.NETWORKS),
  networkDir: (root: string, network: string) => join(root, DIR_NAMES.NETWORKS, network),
  alertsDir: (root: string, network: string) =>
    join(root, DIR_NAMES.NETWORKS, network, DIR_NAMES.ALERTS),
  alertPath: (root: string, network: string, client: string) =>
    join(root, DIR_NAMES.NETWORKS, network, DIR_NAMES.ALERTS, `${client}.json`),
  snapshotsDir: (root: string, network: string) =>
    join(root, DIR_NAMES.NETWORKS, network, DIR_NAMES.SUMMARY, DIR_NAMES.RESULTS),
  snapshotPath: (root: string, network: string, dateKey: string) =>
    join(root, DIR_NAMES.NETWORKS, network, DIR_NAMES.SUMMARY, DIR_NAMES.RESULTS, `${dateKey}.json`),
} as const

/** `<dataDir>/<prefix>` */
export function storeRoot(prefix: string, dataDir: string = DATA_DIR): string {
  return join(dataDir, prefix)
}

/** Path segments must not escape their directory */
export function isSafeSegment(segment: string): boolean {
  return segment.length > 0 && !segment.includes('/') && !segment.includes('\\') && segment !== '.' && segment !== '..'
}
