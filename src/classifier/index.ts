/**
 * @entry Classifier
 *
 * Reachability probe and instance classification
 */

export {
  probeSshBanner,
  createBannerProbe,
  type ProbeResult,
  type ProbeFailure,
  type ReachabilityProbe,
  type BannerProbeOptions,
} from './probeSshBanner.js'
export {
  categorizeInstance,
  createInstanceClassifier,
  type InstanceCategory,
  type InstanceClassifier,
  type ClassifyContext,
} from './classifyInstance.js'
