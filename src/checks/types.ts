import { z } from 'zod'

export type CheckCategory = 'general' | 'sync'
export type CheckStatus = 'pass' | 'fail'

/** Display order of categories in a notification */
export const CATEGORY_ORDER: readonly CheckCategory[] = ['general', 'sync']

export const CATEGORY_LABELS: Record<CheckCategory, string> = {
  general: 'General',
  sync: 'Sync',
}

/** Values a check may put in `details` */
export type DetailValue = string | number | boolean | string[]

export interface CheckResult {
  name: string
  category: CheckCategory
  status: CheckStatus
  description?: string
  timestamp?: string
  details: Record<string, DetailValue>
  /** Node names this check flagged */
  affectedNodes: string[]
}

export interface AnalysisResult {
  rootCause: string[]
  unexplainedIssues: string[]
  /** client -> why it was picked as root cause */
  rootCauseEvidence: Record<string, string>
}

export const detailValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())])

export const checkResultSchema = z.object({
  name: z.string().min(1),
  category: z.enum(['general', 'sync']),
  status: z.enum(['pass', 'fail']),
  description: z.string().optional(),
  timestamp: z.string().optional(),
  details: z.record(detailValueSchema).default({}),
  affectedNodes: z.array(z.string()).default([]),
})

export const checkResultsSchema = z.array(checkResultSchema)
