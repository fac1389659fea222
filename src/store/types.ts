/**
 * Store types
 */

import { z } from 'zod'
import { summaryResultSchema, testResultSchema } from '../regression/types.js'
import type { SummaryResult, TestResult } from '../regression/types.js'

export interface JsonWriteOptions {
  /** Write through a temp file and rename (default true) */
  atomic?: boolean
  /** default 2 */
  indent?: number
}

/** A registered (network, client) pair */
export interface MonitoredTarget {
  network: string
  client: string
  clientType: 'consensus' | 'execution'
  /** Destination identifier handed to the sink */
  channel: string
  /** Cron expression */
  schedule: string
  lastCheckID?: string
  createdAt: string
  updatedAt: string
}

export const monitoredTargetSchema = z.object({
  network: z.string().min(1),
  client: z.string().min(1),
  clientType: z.enum(['consensus', 'execution']),
  channel: z.string(),
  schedule: z.string(),
  lastCheckID: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

/** A snapshot together with the raw results it was built from */
export interface StoredSnapshot {
  summary: SummaryResult
  results: TestResult[]
}

export const storedSnapshotSchema = z.object({
  summary: summaryResultSchema,
  // snapshots written before raw results were kept have none
  results: z.array(testResultSchema).default([]),
})
