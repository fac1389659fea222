/**
 * @entry Config
 *
 * YAML config loading, schema validation, env overrides
 */

export {
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  deepMergeConfig,
  CONFIG_FILENAME,
} from './loadConfig.js'
export * from './schema.js'
