export { SyncCoordinator, syncDirectory } from './sync-coordinator.js';
export type { TypedSyncCoordinatorEmitter } from './sync-coordinator.js';
export { SyncError, isSyncError } from './errors.js';
export { isUnderMaintenance } from './maintenance.js';
export { buildSyncConfig, validateSyncConfig, DEFAULT_SYNC_CONFIG } from './config.js';
export type {
  SyncPhase,
  SyncEngineConfig,
  SyncRequest,
  SyncOutcome,
  FailedDownload,
  HashMismatch,
  SyncCoordinatorOptions,
  SyncCoordinatorEvents,
} from './types.js';
