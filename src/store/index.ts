/**
 * @entry Store
 *
 * File-backed registration and snapshot stores
 */

export * from './types.js'
export { DATA_DIR, STORE_PATHS, storeRoot } from './paths.js'
export { readJson, writeJson } from './readWriteJson.js'
export { createRegistrationStore, type RegistrationStore } from './RegistrationStore.js'
export { createSnapshotStore, type SnapshotStore } from './SnapshotStore.js'
