import { z } from 'zod'

/** One test-suite run for one client and test type */
export interface TestResult {
  /** Test type, e.g. `engine-api` */
  name: string
  client: string
  version: string
  ntests: number
  passes: number
  fails: number
  /** ISO timestamp */
  timestamp: string
  fileName?: string
  testSuiteId?: string
}

export interface ClientSummary {
  clientName: string
  clientVersion: string
  totalTests: number
  passedTests: number
  failedTests: number
  passRate: number
  testTypes: string[]
}

/** Point-in-time rollup for a network */
export interface SummaryResult {
  network: string
  timestamp: string
  totalTests: number
  totalPasses: number
  totalFails: number
  overallPassRate: number
  clientResults: Record<string, ClientSummary>
  testTypes: string[]
}

/** client -> human-readable regression lines */
export type RegressionMap = Record<string, string[]>

export const testResultSchema = z.object({
  name: z.string(),
  client: z.string(),
  version: z.string(),
  ntests: z.number().int().nonnegative(),
  passes: z.number().int().nonnegative(),
  fails: z.number().int().nonnegative(),
  timestamp: z.string(),
  fileName: z.string().optional(),
  testSuiteId: z.string().optional(),
})

export const clientSummarySchema = z.object({
  clientName: z.string(),
  clientVersion: z.string(),
  totalTests: z.number(),
  passedTests: z.number(),
  failedTests: z.number(),
  passRate: z.number(),
  testTypes: z.array(z.string()),
})

export const summaryResultSchema = z.object({
  network: z.string(),
  timestamp: z.string(),
  totalTests: z.number(),
  totalPasses: z.number(),
  totalFails: z.number(),
  overallPassRate: z.number(),
  clientResults: z.record(clientSummarySchema),
  testTypes: z.array(z.string()),
})
