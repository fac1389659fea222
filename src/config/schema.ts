import { z } from 'zod'

export const dataConfigSchema = z.object({
  /** Key prefix under the data dir, mirrors the object-store layout */
  prefix: z.string().default('devnet-alerts'),
})

export const queueConfigSchema = z.object({
  /** Evaluations running at once */
  concurrency: z.number().int().positive().default(3),
  /** Waiting requests beyond which enqueue fails fast */
  capacity: z.number().int().positive().default(100),
  /** Per-evaluation deadline */
  timeoutMs: z.number().int().positive().default(5 * 60 * 1000),
})

export const classifierConfigSchema = z.object({
  domain: z.string().default('ethpandaops.io'),
  port: z.number().int().positive().default(22),
  connectTimeoutMs: z.number().int().positive().default(2000),
  readTimeoutMs: z.number().int().positive().default(3000),
  bannerPrefix: z.string().default('SSH-'),
  readBytes: z.number().int().positive().default(8),
  /** User shown in the ssh hint */
  sshUser: z.string().default('devops'),
})

export const clientsConfigSchema = z.object({
  consensus: z
    .array(z.string())
    .default(['lighthouse', 'prysm', 'lodestar', 'nimbus', 'teku', 'grandine']),
  execution: z
    .array(z.string())
    .default(['nethermind', 'nimbusel', 'besu', 'geth', 'reth', 'erigon', 'ethereumjs']),
  preProduction: z.array(z.string()).default(['ethereumjs', 'nimbusel', 'erigonTwo']),
})

export const checksConfigSchema = z.object({
  /** External command printing a JSON array of check results */
  command: z.string().optional(),
  args: z.array(z.string()).default([]),
})

export const hiveConfigSchema = z.object({
  /** Base URL serving `<network>/listing.jsonl` */
  baseUrl: z.string().url().optional(),
})

export const notifyConfigSchema = z.object({
  /** JSON webhook; console output when unset */
  webhookUrl: z.string().url().optional(),
})

export const grafanaConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  dashboardId: z.string().default('cebekx08rl9tsc'),
  logsDashboardId: z.string().default('aebfg1654nqwwd'),
})

export const configSchema = z.object({
  data: dataConfigSchema.default({}),
  queue: queueConfigSchema.default({}),
  classifier: classifierConfigSchema.default({}),
  clients: clientsConfigSchema.default({}),
  checks: checksConfigSchema.default({}),
  hive: hiveConfigSchema.default({}),
  notify: notifyConfigSchema.default({}),
  grafana: grafanaConfigSchema.default({}),
})

export type Config = z.infer<typeof configSchema>
export type QueueConfig = z.infer<typeof queueConfigSchema>
export type ClassifierConfig = z.infer<typeof classifierConfigSchema>
export type ClientsConfig = z.infer<typeof clientsConfigSchema>
export type GrafanaConfig = z.infer<typeof grafanaConfigSchema>
