/**
 * Snapshot store
 *
 * One test-result snapshot per network and UTC day; a later write on the
 * same day replaces the earlier one.
 */

import { existsSync, readdirSync } from 'fs'
import { basename } from 'path'
import { InsufficientHistoryError, AppError } from '../shared/error.js'
import { parseDateKey, toDateKey } from '../shared/formatTime.js'
import { createLogger } from '../shared/logger.js'
import { ok, err, type Result } from '../shared/result.js'
import type { SummaryResult, TestResult } from '../regression/types.js'
import { readJson, writeJson } from './readWriteJson.js'
import { STORE_PATHS, isSafeSegment } from './paths.js'
import { storedSnapshotSchema, type StoredSnapshot } from './types.js'

const logger = createLogger('snapshots')

export interface SnapshotStore {
  storeResult(summary: SummaryResult, results: readonly TestResult[]): void
  /** Second-newest stored snapshot */
  getPrevious(network: string): Result<StoredSnapshot, InsufficientHistoryError>
  getLatest(network: string): StoredSnapshot | null
  /** Stored date keys, newest first */
  listDates(network: string): string[]
}

/** @param root `<dataDir>/<prefix>` */
export function createSnapshotStore(root: string): SnapshotStore {
  function listDates(network: string): string[] {
    if (!isSafeSegment(network)) throw AppError.validation(`invalid network: ${network}`)

    const dir = STORE_PATHS.snapshotsDir(root, network)
    if (!existsSync(dir)) return []

    return readdirSync(dir)
      .filter(file => file.endsWith('.json'))
      .map(file => basename(file, '.json'))
      .filter(key => parseDateKey(key) !== null)
      .sort()
      .reverse()
  }

  function load(network: string, dateKey: string): StoredSnapshot | null {
    return readJson(STORE_PATHS.snapshotPath(root, network, dateKey), storedSnapshotSchema)
  }

  return {
    listDates,

    storeResult(summary, results) {
      if (!isSafeSegment(summary.network)) throw AppError.validation(`invalid network: ${summary.network}`)

      const stamp = new Date(summary.timestamp)
      const dateKey = toDateKey(Number.isNaN(stamp.getTime()) ? new Date() : stamp)
      const snapshot: StoredSnapshot = { summary, results: [...results] }
      writeJson(STORE_PATHS.snapshotPath(root, summary.network, dateKey), snapshot)
      logger.debug(`Stored snapshot ${summary.network}/${dateKey}`)
    },

    getPrevious(network) {
      const dates = listDates(network)
      if (dates.length === 0) {
        return err(AppError.insufficientHistory('no previous summary results found'))
      }
      const previousDate = dates[1]
      if (previousDate === undefined) {
        return err(AppError.insufficientHistory('only one summary result found, need at least two for comparison'))
      }

      const snapshot = load(network, previousDate)
      if (!snapshot) {
        return err(AppError.insufficientHistory(`summary result for ${previousDate} is unreadable`))
      }
      return ok(snapshot)
    },

    getLatest(network) {
      const latest = listDates(network)[0]
      return latest === undefined ? null : load(network, latest)
    },
  }
}
