/**
 * @entry Regression
 *
 * Test-result snapshots and the regression diff between two of them
 */

export * from './types.js'
export { groupLatestByClientAndTestType, filterLatestResults } from './groupResults.js'
export { buildSummary } from './buildSummary.js'
export {
  detectRegressions,
  findTestTypeRegressions,
  formatRegressions,
  type RawResults,
} from './detectRegressions.js'
export { createHttpTestResultSource, parseListing, type TestResultSource } from './testResultSource.js'
