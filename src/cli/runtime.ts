/**
 * Wire config into the stores, the pipeline and the queue.
 */

import { createCommandCheckExecutor } from '../checks/commandExecutor.js'
import { createInstanceClassifier } from '../classifier/classifyInstance.js'
import { createBannerProbe } from '../classifier/probeSshBanner.js'
import { createClientCatalog, type ClientCatalog } from '../clients/catalog.js'
import type { Config } from '../config/schema.js'
import { createConsoleSink, createWebhookSink } from '../notify/sinks.js'
import type { NotificationSink } from '../notify/types.js'
import { createEvaluationHandler, type PipelineDeps } from '../pipeline/evaluateTarget.js'
import { createHttpTestResultSource } from '../regression/testResultSource.js'
import { createEvaluationQueue, type EvaluationQueue } from '../scheduler/queue.js'
import { AppError } from '../shared/error.js'
import { storeRoot } from '../store/paths.js'
import { createRegistrationStore, type RegistrationStore } from '../store/RegistrationStore.js'
import { createSnapshotStore, type SnapshotStore } from '../store/SnapshotStore.js'

export interface Stores {
  registrations: RegistrationStore
  snapshots: SnapshotStore
}

export function createStores(config: Config): Stores {
  const root = storeRoot(config.data.prefix)
  return {
    registrations: createRegistrationStore(root),
    snapshots: createSnapshotStore(root),
  }
}

export function createCatalog(config: Config): ClientCatalog {
  return createClientCatalog(config.clients)
}

export function createSink(config: Config): NotificationSink {
  return config.notify.webhookUrl ? createWebhookSink(config.notify.webhookUrl) : createConsoleSink()
}

export function createPipelineDeps(config: Config, stores: Stores): PipelineDeps {
  const { command, args } = config.checks
  if (!command) {
    throw AppError.configInvalid('checks.command is not set')
  }

  const { classifier: probeConfig, grafana, hive } = config
  const probe = createBannerProbe({
    connectTimeoutMs: probeConfig.connectTimeoutMs,
    readTimeoutMs: probeConfig.readTimeoutMs,
    bannerPrefix: probeConfig.bannerPrefix,
    readBytes: probeConfig.readBytes,
  })

  return {
    executor: createCommandCheckExecutor({ command, args }),
    classifier: createInstanceClassifier({
      probe,
      preProductionClients: config.clients.preProduction,
      domain: probeConfig.domain,
      port: probeConfig.port,
    }),
    registrations: stores.registrations,
    snapshots: stores.snapshots,
    testResults: hive.baseUrl ? createHttpTestResultSource(hive.baseUrl) : undefined,
    sink: createSink(config),
    links: {
      grafanaBaseUrl: grafana.baseUrl,
      dashboardId: grafana.dashboardId,
      logsDashboardId: grafana.logsDashboardId,
      hiveBaseUrl: hive.baseUrl,
    },
    sshUser: probeConfig.sshUser,
  }
}

export function createQueue(config: Config, deps: PipelineDeps): EvaluationQueue {
  return createEvaluationQueue(config.queue, createEvaluationHandler(deps))
}
