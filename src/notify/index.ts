/**
 * @entry Notify
 *
 * Notification decision engine, payload rendering and sinks
 */

export * from './types.js'
export { extractInstances, parseInstanceLine, INSTANCE_DETAIL_KEYS } from './extractInstances.js'
export { hashToColor } from './hashToColor.js'
export {
  decideNotification,
  hasOnlyInfraOrUnrelatedIssues,
  isEligible,
  buildLinks,
  type DecisionInput,
  type LinkOptions,
} from './decideNotification.js'
export { renderPayloadText, SECTION_HEADERS } from './renderPayload.js'
export { createConsoleSink, createWebhookSink } from './sinks.js'
