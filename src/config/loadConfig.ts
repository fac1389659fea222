import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import { createLogger } from '../shared/logger.js'
import { configSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.devnet-alerts.yaml'

let cachedConfig: Config | null = null

/**
 * Locate config files. The global file is the base, the project file overrides it.
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // cwd == home: load it once
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * Load config: ./.devnet-alerts.yaml over ~/.devnet-alerts.yaml over defaults.
 * Invalid files fall back to defaults with a warning.
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : {}
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : {}
  const merged = deepMergeConfig(globalRaw, projectRaw)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    logger.warn('Config file format error, using defaults', result.error.issues)
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Empty or comment-only files parse to {} */
async function parseYamlFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed: unknown = YAML.parse(content)
  return isRecord(parsed) ? parsed : {}
}

/**
 * Merge config objects, override wins. Nested objects merge, arrays replace.
 */
export function deepMergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const key of Object.keys(override)) {
    const val = override[key]
    if (val === undefined || val === null) continue
    const existing = result[key]
    if (isRecord(val) && isRecord(existing)) {
      result[key] = deepMergeConfig(existing, val)
    } else {
      result[key] = val
    }
  }
  return result
}

/**
 * Environment overrides, applied after validation.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  let next = config

  if (env.DEVNET_ALERTS_WEBHOOK_URL) {
    next = { ...next, notify: { ...next.notify, webhookUrl: env.DEVNET_ALERTS_WEBHOOK_URL } }
  }

  if (env.DEVNET_ALERTS_HIVE_URL) {
    next = { ...next, hive: { ...next.hive, baseUrl: env.DEVNET_ALERTS_HIVE_URL } }
  }

  if (env.DEVNET_ALERTS_GRAFANA_URL) {
    next = { ...next, grafana: { ...next.grafana, baseUrl: env.DEVNET_ALERTS_GRAFANA_URL } }
  }

  if (env.DEVNET_ALERTS_CONCURRENCY) {
    const concurrency = Number.parseInt(env.DEVNET_ALERTS_CONCURRENCY, 10)
    if (Number.isInteger(concurrency) && concurrency > 0) {
      next = { ...next, queue: { ...next.queue, concurrency } }
    } else {
      logger.warn(`Ignoring DEVNET_ALERTS_CONCURRENCY=${env.DEVNET_ALERTS_CONCURRENCY}`)
    }
  }

  return next
}

export function getDefaultConfig(): Config {
  return configSchema.parse({})
}

export function clearConfigCache(): void {
  cachedConfig = null
}
