export {
  collectRegressions,
  evaluateTarget,
  createEvaluationHandler,
  type PipelineDeps,
} from './evaluateTarget.js'
