/**
 * @entry Checks
 *
 * Check result types, the correlator, and the two-pass check run
 */

export * from './types.js'
export { parseClientPair, type ClientPair } from './parseClientPair.js'
export { correlate, createCorrelator, MIN_FAILURES_FOR_ROOT_CAUSE, type Correlator } from './correlate.js'
export {
  runChecks,
  filterResultForClient,
  type CheckExecutor,
  type CheckRun,
  type CheckRunRequest,
} from './runChecks.js'
export { createCommandCheckExecutor, parseCheckOutput } from './commandExecutor.js'
