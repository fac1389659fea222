/**
 * Vitest global setup
 * Removes the data written by store tests once the run is over.
 *
 * DEVNET_ALERTS_DATA_DIR is pointed at a temp dir by vitest.config.ts,
 * so this never touches a real data dir.
 */

import { rmSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { afterAll } from 'vitest'

const DATA_DIR = process.env.DEVNET_ALERTS_DATA_DIR || join(tmpdir(), 'devnet-alerts-test-data')

// refuse to clean anything outside the temp dir
const isSafeDir = DATA_DIR.startsWith(tmpdir()) || DATA_DIR.includes('devnet-alerts-test')

afterAll(() => {
  if (!isSafeDir) {
    console.warn(`[setup] Refusing to clean non-temp data dir: ${DATA_DIR}`)
    return
  }
  if (existsSync(DATA_DIR)) {
    rmSync(DATA_DIR, { recursive: true, force: true })
  }
})
