/**
 * devnet-alerts
 *
 * Library entry: everything the CLI is built from.
 */

export * from './checks/index.js'
export * from './classifier/index.js'
export { createClientCatalog, parseClientType, type ClientCatalog, type ClientType } from './clients/catalog.js'
export * from './config/index.js'
export * from './notify/index.js'
export * from './pipeline/index.js'
export * from './regression/index.js'
export * from './scheduler/index.js'
export * from './store/index.js'
export {
  AppError,
  AlertAlreadyRegisteredError,
  AlertNotRegisteredError,
  InsufficientHistoryError,
  printError,
  type ErrorCategory,
  type ErrorCode,
} from './shared/error.js'
export { createLogger, logError, setLogLevel, type Logger, type LogLevel } from './shared/logger.js'
export { ok, err, fromPromise, type Result } from './shared/result.js'
export { generateCheckId } from './shared/generateId.js'
